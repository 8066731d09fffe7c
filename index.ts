// netdrift - Main Entry Point
// Exports all public APIs

// Run orchestration
export { runMonitor } from './src/application/services/monitorRun';
export type { MonitorDependencies } from './src/application/services/monitorRun';
export { CycleRunner, Observer } from './src/application/services/monitorRun/modules';
export { Notifier } from './src/application/services/notifier';
export type { NotifierOptions } from './src/application/services/notifier';

// Configuration
export { loadConfig, loadEnvironment } from './src/config/monitorConfig';
export type { MonitorConfig, ConfigOverrides, StateBackend } from './src/config/monitorConfig';

// Diff Engine
export { diff, decideEvents } from './src/domain/diff/diffEngine';

// Observation parsing
export { parsePorts, parseHosts, isScanComplete } from './src/domain/parsers/scanOutputParser';

// Entity kinds
export { getEntityDescriptor, isEntityKind, ALERT_COLORS } from './src/domain/kinds/entityKinds';
export type { EntityKindDescriptor, AlertTemplate } from './src/domain/kinds/entityKinds';

// Snapshots
export { createSnapshot, emptySnapshot } from './src/domain/snapshot/snapshot';
export { decodeSnapshotRecord, encodeSnapshot } from './src/domain/snapshot/snapshotRecord';
export { FileSnapshotStore } from './src/infrastructure/adapters/persistence/fileSnapshotStore';
export { RedisSnapshotStore } from './src/infrastructure/adapters/persistence/redisSnapshotStore';

// Notifications
export { buildAlertEmbed } from './src/domain/notifications/alertFormatter';
export { WebhookTransportAdapter } from './src/infrastructure/adapters/notifications/webhookTransportAdapter';

// Ports
export type { SnapshotStorePort } from './src/domain/ports/snapshotStore';
export type { ScannerPort } from './src/domain/ports/scanner';
export type { LoggerPort } from './src/domain/ports/logger';
export type {
  NotificationTransportPort,
  WebhookPayload,
  WebhookEmbed,
  WebhookField,
  DeliveryResult,
} from './src/domain/ports/notificationTransport';

// Types
export type {
  EntityKind,
  Snapshot,
  Delta,
  ChangeEvent,
  ChangeEventType,
  CycleResult,
  RunSummary,
  SnapshotRecord,
  ScanRequest,
  ScanResult,
} from './src/domain/types/types';
