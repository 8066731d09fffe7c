import { SnapshotStorePort } from '../../../../domain/ports/snapshotStore';
import { LoggerPort } from '../../../../domain/ports/logger';
import { CycleResult, EntityKind } from '../../../../domain/types/types';
import { decideEvents, diff } from '../../../../domain/diff/diffEngine';
import { Notifier } from '../../notifier';
import { Observer } from './observer';

export class CycleRunner {
  constructor(
    private readonly observer: Observer,
    private readonly store: SnapshotStorePort,
    private readonly notifier: Notifier,
    private readonly logger: LoggerPort
  ) {}

  /**
   * observe → load previous → diff → notify → persist.
   * A failed observation ends the cycle before the store is touched.
   * Persist failures propagate.
   */
  async run<K extends EntityKind>(kind: K, subject: string): Promise<CycleResult> {
    const startTime = Date.now();
    this.logger.log('CycleRunner', `Starting ${kind} cycle`, { subject });

    const observation = await this.observer.observe(kind);
    if (!observation.ok) {
      this.logger.logError('CycleRunner', `Observation failed for ${kind} (${subject}), snapshot left untouched`, observation.reason);
      return { kind, status: 'scan_failed', reason: observation.reason };
    }

    const current = observation.snapshot;
    const previous = await this.store.load(kind);
    const delta = diff(previous.elements, current.elements);
    const events = decideEvents(kind, previous.elements, current.elements);

    this.logger.logVerbose('CycleRunner', 'Snapshot compared', {
      kind,
      subject,
      previous_count: previous.elements.length,
      current_count: current.elements.length,
      added: delta.added,
      removed: delta.removed,
      events: events.map(event => event.type),
    });

    if (previous.elements.length > 0 && current.elements.length === 0) {
      this.logger.logWarning('CycleRunner', `Scan succeeded but observed no ${kind}`, {
        subject,
        previous_count: previous.elements.length,
      });
    }

    for (const event of events) {
      await this.notifier.notify(event);
    }

    await this.store.save(kind, current);

    this.logger.logPerformance(`[CycleRunner] ${kind} cycle`, Date.now() - startTime, {
      subject,
      elements: current.elements.length,
    });

    return {
      kind,
      status: 'completed',
      elementCount: current.elements.length,
      added: delta.added.length,
      removed: delta.removed.length,
      events: events.map(event => event.type),
    };
  }
}
