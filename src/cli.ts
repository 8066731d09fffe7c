#!/usr/bin/env node
// Operator CLI Entrypoint
// One invocation = one comparison per entity kind; scheduling is external (cron, systemd timer)

import { Command } from 'commander';
import { ConfigOverrides, MonitorConfig, loadConfig, loadEnvironment } from './config/monitorConfig';
import { runMonitor } from './application/services/monitorRun';
import { SnapshotStorePort } from './domain/ports/snapshotStore';
import { ENTITY_KINDS, RunSummary } from './domain/types/types';
import { FileSnapshotStore } from './infrastructure/adapters/persistence/fileSnapshotStore';
import { RedisSnapshotStore, createRedisClient } from './infrastructure/adapters/persistence/redisSnapshotStore';
import { ScannerAdapter } from './infrastructure/adapters/os/scannerAdapter';
import { WebhookTransportAdapter } from './infrastructure/adapters/notifications/webhookTransportAdapter';
import { LoggerAdapter } from './infrastructure/adapters/logging/loggerAdapter';
import { formatElements } from './domain/notifications/alertFormatter';
import {
  closeLogFile,
  configureLogFile,
  logError,
  logVerbose as logVerboseShared,
} from './infrastructure/adapters/logging/logger';

function logVerbose(component: string, message: string, data?: Record<string, unknown>): void {
  logVerboseShared(`CLI:${component}`, message, data);
}

type GlobalOptions = Partial<Record<keyof ConfigOverrides | 'envFile', string>>;

interface StoreHandle {
  store: SnapshotStorePort;
  close(): Promise<void>;
}

/**
 * Build the configured snapshot store; `close` releases its connection, if any
 */
export function openSnapshotStore(config: MonitorConfig): StoreHandle {
  if (config.state.backend === 'redis') {
    const client = createRedisClient(config.state.redis);
    return {
      store: new RedisSnapshotStore(client, config.state.keyPrefix),
      // All commands have been awaited by now
      close: async () => {
        client.disconnect();
      },
    };
  }
  return {
    store: new FileSnapshotStore(config.state.files),
    close: async () => {},
  };
}

function resolveConfig(program: Command): MonitorConfig {
  const globalOpts = program.opts<GlobalOptions>();
  const env = loadEnvironment(globalOpts.envFile);
  const config = loadConfig(env, globalOpts);
  configureLogFile(config.logFile);
  logVerbose('Config', 'Configuration loaded', {
    target: config.target,
    subnet: config.subnet,
    state_backend: config.state.backend,
    webhook_configured: config.webhook.url !== undefined,
  });
  return config;
}

/**
 * Run one scan/compare/notify/persist pass for every entity kind
 */
async function run(config: MonitorConfig): Promise<RunSummary> {
  const handle = openSnapshotStore(config);
  try {
    return await runMonitor(config, {
      scanner: new ScannerAdapter(),
      store: handle.store,
      transport: config.webhook.url
        ? new WebhookTransportAdapter(config.webhook.url, config.webhook.timeoutMs)
        : null,
      logger: new LoggerAdapter(),
    });
  } finally {
    await handle.close();
  }
}

/**
 * Print the persisted snapshots without scanning
 */
async function status(config: MonitorConfig): Promise<void> {
  const handle = openSnapshotStore(config);
  try {
    for (const kind of ENTITY_KINDS) {
      const snapshot = await handle.store.load(kind);
      const subject = kind === 'ports' ? config.target : config.subnet;
      console.log(`\n=== ${kind} (${subject}) ===`);
      console.log(`Captured: ${snapshot.capturedAt > 0 ? new Date(snapshot.capturedAt * 1000).toISOString() : '(never)'}`);
      console.log(`Count: ${snapshot.elements.length}`);
      console.log(`Elements: ${formatElements(snapshot.elements)}`);
    }
  } finally {
    await handle.close();
  }
}

async function execute(action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error) {
    logError('CLI', 'Fatal error', error);
    process.exitCode = 1;
  } finally {
    await closeLogFile();
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('netdrift')
    .description('Detect new or closed ports on a host and new or vanished hosts on a subnet')
    .option('--env-file <path>', 'Load environment variables from this file instead of ./.env')
    .option('--target <host>', 'Target host for the port scan (overrides TARGET)')
    .option('--subnet <cidr>', 'Subnet for host discovery (overrides SUBNET)')
    .option('--nmap-path <path>', 'Scan tool executable (overrides NMAP_PATH)')
    .option('--webhook-url <url>', 'Notification webhook (overrides WEBHOOK_URL)')
    .option('--state-backend <backend>', 'Snapshot storage: file or redis (overrides STATE_BACKEND)')
    .option('--log-file <path>', 'Append log lines to this file (overrides LOG_FILE)');

  program
    .command('run', { isDefault: true })
    .description('Scan, compare with the previous snapshot, notify on changes and persist')
    .action(async () => {
      await execute(async () => {
        const summary = await run(resolveConfig(program));
        logVerbose('Run', 'Run summary', { ...summary });
      });
    });

  program
    .command('status')
    .description('Show the persisted snapshots')
    .action(async () => {
      await execute(() => status(resolveConfig(program)));
    });

  return program;
}

// Only parse when run directly or through the installed bin link, not when imported
if (require.main === module) {
  createProgram().parseAsync().catch((error: unknown) => {
    logError('CLI', 'Failed to parse arguments', error);
    process.exitCode = 1;
  });
}

export { run, status };
