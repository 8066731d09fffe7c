// Monitor Run - one invocation: ports cycle, then hosts cycle
// Cycles are independent; a failed scan only ends its own cycle.
// Persist failures are fatal and propagate to the caller.

import { ENTITY_KINDS, CycleResult, EntityKind, RunSummary } from '../../../domain/types/types';
import { ScannerPort } from '../../../domain/ports/scanner';
import { SnapshotStorePort } from '../../../domain/ports/snapshotStore';
import { NotificationTransportPort } from '../../../domain/ports/notificationTransport';
import { LoggerPort } from '../../../domain/ports/logger';
import { MonitorConfig } from '../../../config/monitorConfig';
import { Notifier } from '../notifier';
import { CycleRunner, Observer } from './modules';

export interface MonitorDependencies {
  scanner: ScannerPort;
  store: SnapshotStorePort;
  transport: NotificationTransportPort | null;
  logger: LoggerPort;
  clock?: () => Date;
}

function describeCount(cycles: CycleResult[], kind: EntityKind): string {
  const cycle = cycles.find(c => c.kind === kind);
  return cycle && cycle.status === 'completed' ? String(cycle.elementCount) : 'n/a';
}

export async function runMonitor(
  config: MonitorConfig,
  deps: MonitorDependencies
): Promise<RunSummary> {
  const { logger } = deps;
  const clock = deps.clock ?? (() => new Date());
  const started = clock();
  const subjects: Record<EntityKind, string> = {
    ports: config.target,
    hosts: config.subnet,
  };

  const observer = new Observer(
    deps.scanner,
    {
      nmapPath: config.scan.nmapPath,
      timeoutsMs: config.scan.timeoutsMs,
      subjects,
    },
    logger,
    () => Math.floor(clock().getTime() / 1000)
  );
  const notifier = new Notifier(
    deps.transport,
    { username: config.webhook.username, subjects, clock },
    logger
  );
  const cycleRunner = new CycleRunner(observer, deps.store, notifier, logger);

  logger.log('MonitorRun', 'Run started', { target: config.target, subnet: config.subnet });

  const cycles: CycleResult[] = [];
  for (const kind of ENTITY_KINDS) {
    cycles.push(await cycleRunner.run(kind, subjects[kind]));
  }

  const durationMs = clock().getTime() - started.getTime();
  logger.log(
    'MonitorRun',
    `Scan completed - Target: ${describeCount(cycles, 'ports')} ports, Subnet: ${describeCount(cycles, 'hosts')} hosts`
  );
  logger.logPerformance('[MonitorRun] Run', durationMs, {
    failed_cycles: cycles.filter(c => c.status === 'scan_failed').map(c => c.kind),
  });

  return {
    startedAt: started.toISOString(),
    durationMs,
    cycles,
  };
}
