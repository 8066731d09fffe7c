import { TestHarness } from '@helpers/test-harness';

describe('Functional: failure handling', () => {
  let harness: TestHarness;

  beforeEach(() => {
    harness = new TestHarness();
  });

  it('should abort only the failed kind and keep its snapshot', async () => {
    harness.seed('ports', [22, 80]).seed('hosts', ['10.0.0.5']);
    harness.scanner.setFailure('ports', new Error('Scan process (ports) timed out after 300000ms'));
    harness.observeHosts(['10.0.0.5', '10.0.0.9']);

    const summary = await harness.run();

    expect(summary.cycles).toEqual([
      { kind: 'ports', status: 'scan_failed', reason: 'Scan process (ports) timed out after 300000ms' },
      { kind: 'hosts', status: 'completed', elementCount: 2, added: 1, removed: 0, events: ['Added'] },
    ]);
    expect(harness.stored('ports')).toEqual({ version: 1, kind: 'ports', elements: [22, 80], capturedAt: 1760000000 });
    expect(harness.transport.titles()).toEqual(['🆕 New hosts detected']);
  });

  it('should not raise a disappearance alert when the sweep exits non-zero', async () => {
    harness.seed('ports', [22]).seed('hosts', ['10.0.0.5']);
    harness.observePorts([22]);
    harness.scanner.setResponse('hosts', { exitCode: 1, stderr: 'dnet: Failed to open device eth9' });

    const summary = await harness.run();

    expect(summary.cycles[1]).toEqual({
      kind: 'hosts',
      status: 'scan_failed',
      reason: 'scan exited with code 1: dnet: Failed to open device eth9',
    });
    expect(harness.transport.delivered).toEqual([]);
    expect(harness.stored('hosts')?.elements).toEqual(['10.0.0.5']);
  });

  it('should complete the run and persist when every delivery fails', async () => {
    harness.transport.respondWith(404);
    harness.observePorts([22]).observeHosts(['10.0.0.5']);

    const summary = await harness.run();

    expect(summary.cycles.every(cycle => cycle.status === 'completed')).toBe(true);
    expect(harness.stored('ports')?.elements).toEqual([22]);
    expect(harness.stored('hosts')?.elements).toEqual(['10.0.0.5']);
  });

  it('should reject the run when a snapshot cannot be persisted', async () => {
    harness.redis.failOn('set', new Error('Connection is closed.'));
    harness.observePorts([22]).observeHosts(['10.0.0.5']);

    await expect(harness.run()).rejects.toThrow('Failed to persist ports snapshot to key test:snapshot:ports: Connection is closed.');
    // The hosts cycle never starts after a fatal persist failure
    expect(harness.scanner.getCallHistory().map(request => request.kind)).toEqual(['ports']);
  });

  it('should log the run summary line', async () => {
    harness.scanner.setFailure('hosts', new Error('Scan process (hosts) error: spawn nmap EACCES'));
    harness.observePorts([22, 443]);

    await harness.run();

    expect(harness.logger.log).toHaveBeenCalledWith('MonitorRun', 'Scan completed - Target: 2 ports, Subnet: n/a hosts');
  });
});
