// Scan Executor - spawn the scan tool and collect its output
// Bounded by an explicit timeout; the process is killed when it elapses

import { spawn } from 'child_process';
import { ScanRequest, ScanResult } from '../../../../domain/types/types';
import { log as logShared, logVerbose } from '../../../adapters/logging/logger';

function log(message: string, ...args: unknown[]): void {
  logShared('ScanExecutor', message, ...args);
}

const KILL_GRACE_MS = 5000;

export async function executeScan(request: ScanRequest): Promise<ScanResult> {
  const { command, args, timeoutMs, kind } = request;
  log(`Running: ${command} ${args.join(' ')}`);
  logVerbose('ScanExecutor', 'Spawning scan process', {
    kind,
    command,
    args,
    timeout_ms: timeoutMs,
  });

  const startTime = Date.now();

  return new Promise<ScanResult>((resolve, reject) => {
    const childProcess = spawn(command, args, {
      env: process.env,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';
    let settled = false;
    let killTimer: NodeJS.Timeout | undefined;

    const timeout = setTimeout(() => {
      if (settled) return;
      settled = true;
      log(`Scan process timed out after ${timeoutMs}ms, PID: ${childProcess.pid}`);
      childProcess.kill('SIGTERM');
      // nmap normally exits on SIGTERM; escalate if it does not
      killTimer = setTimeout(() => childProcess.kill('SIGKILL'), KILL_GRACE_MS);
      killTimer.unref();
      reject(new Error(`Scan process (${kind}) timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    childProcess.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString('utf8');
    });

    childProcess.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString('utf8');
    });

    childProcess.on('close', (code) => {
      clearTimeout(timeout);
      if (killTimer) clearTimeout(killTimer);
      if (settled) return;
      settled = true;

      const exitCode = code ?? 1;
      const durationMs = Date.now() - startTime;
      log(`Scan process closed, exit code: ${exitCode}`);
      logVerbose('ScanExecutor', 'Scan process completed', {
        kind,
        exit_code: exitCode,
        stdout_length: stdout.length,
        stderr_length: stderr.length,
        duration_ms: durationMs,
      });

      resolve({ stdout, stderr, exitCode, durationMs });
    });

    childProcess.on('error', (error) => {
      clearTimeout(timeout);
      if (settled) return;
      settled = true;
      log(`ERROR: Scan process error: ${error.message}`);
      reject(new Error(`Scan process (${kind}) error: ${error.message}`));
    });
  });
}
