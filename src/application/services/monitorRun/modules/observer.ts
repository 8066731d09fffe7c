import { ScannerPort } from '../../../../domain/ports/scanner';
import { LoggerPort } from '../../../../domain/ports/logger';
import { ElementOf, EntityKind, ScanResult, Snapshot } from '../../../../domain/types/types';
import { getEntityDescriptor } from '../../../../domain/kinds/entityKinds';
import { createSnapshot } from '../../../../domain/snapshot/snapshot';
import { isScanComplete } from '../../../../domain/parsers/scanOutputParser';

export interface ObserverConfig {
  nmapPath: string;
  timeoutsMs: Record<EntityKind, number>;
  subjects: Record<EntityKind, string>;
}

export type Observation<K extends EntityKind> =
  | { ok: true; snapshot: Snapshot<ElementOf<K>> }
  | { ok: false; reason: string };

const STDERR_PREVIEW_LENGTH = 500;

export class Observer {
  constructor(
    private readonly scanner: ScannerPort,
    private readonly config: ObserverConfig,
    private readonly logger: LoggerPort,
    private readonly clock: () => number = () => Math.floor(Date.now() / 1000)
  ) {}

  /**
   * Scan and parse one entity kind.
   * A scan that fails to run, times out or exits non-zero is a failed observation;
   * an empty parse of a successful scan is a genuine empty observation.
   */
  async observe<K extends EntityKind>(kind: K): Promise<Observation<K>> {
    const descriptor = getEntityDescriptor(kind);
    const subject = this.config.subjects[kind];

    let result: ScanResult;
    try {
      result = await this.scanner.scan({
        kind,
        command: this.config.nmapPath,
        args: descriptor.scanArgs(subject),
        timeoutMs: this.config.timeoutsMs[kind],
      });
    } catch (error) {
      return { ok: false, reason: error instanceof Error ? error.message : String(error) };
    }

    if (result.exitCode !== 0) {
      const stderr = result.stderr.trim().substring(0, STDERR_PREVIEW_LENGTH);
      return {
        ok: false,
        reason: `scan exited with code ${result.exitCode}${stderr ? `: ${stderr}` : ''}`,
      };
    }

    const elements = descriptor.parse(result.stdout);
    if (!isScanComplete(result.stdout)) {
      this.logger.logWarning('Observer', 'Scan output has no completion trailer', {
        kind,
        subject,
        stdout_length: result.stdout.length,
        parsed_elements: elements.length,
      });
    }

    this.logger.logPerformance(`[Observer] Scan ${kind}`, result.durationMs, {
      subject,
      parsed_elements: elements.length,
    });
    return { ok: true, snapshot: createSnapshot(kind, elements, descriptor.compare, this.clock()) };
  }
}
