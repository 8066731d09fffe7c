import { ScannerPort } from '../../../domain/ports/scanner';
import { ScanRequest, ScanResult } from '../../../domain/types/types';
import { executeScan } from '../../connectors/os/executors/scanExecutor';

export class ScannerAdapter implements ScannerPort {
  async scan(request: ScanRequest): Promise<ScanResult> {
    return executeScan(request);
  }
}
