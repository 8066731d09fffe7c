import { CycleRunner } from '../../../../../../src/application/services/monitorRun/modules/cycleRunner';
import { Observer } from '../../../../../../src/application/services/monitorRun/modules/observer';
import { Notifier } from '../../../../../../src/application/services/notifier';
import { RedisSnapshotStore } from '../../../../../../src/infrastructure/adapters/persistence/redisSnapshotStore';
import { ScannerMock } from '../../../../../mocks/infrastructure/scanner/scanner.mock';
import { TransportMock } from '../../../../../mocks/infrastructure/notifications/transport.mock';
import { RedisMock } from '../../../../../mocks/infrastructure/redis/redis-mock';
import { LoggerMock } from '../../../../../mocks/adapters/logger.mock';
import { buildPortsOutput } from '../../../../../fixtures/scanOutput';

const subjects = { ports: '192.168.1.10', hosts: '10.0.0.0/24' };

describe('CycleRunner', () => {
  let scanner: ScannerMock;
  let transport: TransportMock;
  let redis: RedisMock;
  let logger: LoggerMock;
  let runner: CycleRunner;

  const seedPorts = (ports: number[]) => {
    redis.data.set('test:ports', JSON.stringify({ version: 1, kind: 'ports', elements: ports, capturedAt: 1700000000 }));
  };

  const storedPorts = (): unknown => {
    const raw = redis.data.get('test:ports');
    return raw === undefined ? undefined : JSON.parse(raw);
  };

  beforeEach(() => {
    scanner = new ScannerMock();
    transport = new TransportMock();
    redis = new RedisMock();
    logger = new LoggerMock();
    const observer = new Observer(
      scanner,
      { nmapPath: 'nmap', timeoutsMs: { ports: 1000, hosts: 1000 }, subjects },
      logger,
      () => 1760000000
    );
    const notifier = new Notifier(transport, { username: 'Webhooks BOT', subjects }, logger);
    runner = new CycleRunner(observer, new RedisSnapshotStore(redis, 'test'), notifier, logger);
  });

  it('should notify the added ports and persist the current snapshot', async () => {
    seedPorts([22, 80]);
    scanner.setOutput('ports', buildPortsOutput('192.168.1.10', [22, 80, 443]));

    const result = await runner.run('ports', '192.168.1.10');

    expect(result).toEqual({ kind: 'ports', status: 'completed', elementCount: 3, added: 1, removed: 0, events: ['Added'] });
    expect(transport.titles()).toEqual(['⚠️ New ports detected']);
    expect(storedPorts()).toEqual({ version: 1, kind: 'ports', elements: [22, 80, 443], capturedAt: 1760000000 });
  });

  it('should persist even when nothing changed', async () => {
    seedPorts([22]);
    scanner.setOutput('ports', buildPortsOutput('192.168.1.10', [22]));

    const result = await runner.run('ports', '192.168.1.10');

    expect(result).toEqual({ kind: 'ports', status: 'completed', elementCount: 1, added: 0, removed: 0, events: [] });
    expect(transport.delivered).toHaveLength(0);
    expect(storedPorts()).toEqual({ version: 1, kind: 'ports', elements: [22], capturedAt: 1760000000 });
  });

  it('should leave the snapshot untouched when the scan fails', async () => {
    seedPorts([22, 80]);
    scanner.setFailure('ports', new Error('Scan process (ports) error: spawn nmap ENOENT'));

    const result = await runner.run('ports', '192.168.1.10');

    expect(result).toEqual({ kind: 'ports', status: 'scan_failed', reason: 'Scan process (ports) error: spawn nmap ENOENT' });
    expect(transport.delivered).toHaveLength(0);
    expect(storedPorts()).toEqual({ version: 1, kind: 'ports', elements: [22, 80], capturedAt: 1700000000 });
    expect(redis.getCallHistory()).toEqual([]);
    expect(logger.logError).toHaveBeenCalledWith(
      'CycleRunner',
      'Observation failed for ports (192.168.1.10), snapshot left untouched',
      'Scan process (ports) error: spawn nmap ENOENT'
    );
  });

  it('should persist even when delivery fails', async () => {
    transport.failWith(new Error('socket hang up'));
    scanner.setOutput('ports', buildPortsOutput('192.168.1.10', [22]));

    const result = await runner.run('ports', '192.168.1.10');

    expect(result.status).toBe('completed');
    expect(storedPorts()).toEqual({ version: 1, kind: 'ports', elements: [22], capturedAt: 1760000000 });
  });

  it('should propagate a persist failure', async () => {
    redis.failOn('set', new Error('READONLY You can\'t write against a read only replica.'));
    scanner.setOutput('ports', buildPortsOutput('192.168.1.10', [22]));

    await expect(runner.run('ports', '192.168.1.10')).rejects.toThrow(
      'Failed to persist ports snapshot to key test:ports: READONLY You can\'t write against a read only replica.'
    );
  });

  it('should warn when a successful scan observes nothing after a non-empty baseline', async () => {
    seedPorts([22]);
    scanner.setOutput('ports', buildPortsOutput('192.168.1.10', []));

    const result = await runner.run('ports', '192.168.1.10');

    expect(result).toEqual({ kind: 'ports', status: 'completed', elementCount: 0, added: 0, removed: 1, events: ['Removed'] });
    expect(logger.logWarning).toHaveBeenCalledWith('CycleRunner', 'Scan succeeded but observed no ports', {
      subject: '192.168.1.10',
      previous_count: 1,
    });
  });
});
