// Port: Logger
// Interface for system logging

export interface LoggerPort {
  log(module: string, message: string, ...args: unknown[]): void;
  logVerbose(component: string, message: string, data?: Record<string, unknown>): void;
  logPerformance(operation: string, duration: number, metadata?: Record<string, unknown>): void;
  logWarning(module: string, message: string, data?: Record<string, unknown>): void;
  logError(module: string, message: string, error?: unknown): void;
}
