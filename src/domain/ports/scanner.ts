// Port: Scanner
// Interface for invoking the external scan tool

import { ScanRequest, ScanResult } from '../types/types';

export interface ScannerPort {
  /**
   * Run one scan to completion.
   * Rejects on spawn failure or when the timeout elapses; a non-zero exit resolves.
   */
  scan(request: ScanRequest): Promise<ScanResult>;
}
