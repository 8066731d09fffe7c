import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { FileSnapshotStore } from '../../../src/infrastructure/adapters/persistence/fileSnapshotStore';

describe('FileSnapshotStore', () => {
  let dir: string;
  let paths: { ports: string; hosts: string };
  let store: FileSnapshotStore;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'netdrift-store-'));
    paths = {
      ports: path.join(dir, 'state', 'ports.json'),
      hosts: path.join(dir, 'state', 'hosts.json'),
    };
    store = new FileSnapshotStore(paths);
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('load', () => {
    it('should return the empty snapshot when no file exists', async () => {
      await expect(store.load('ports')).resolves.toEqual({ kind: 'ports', elements: [], capturedAt: 0 });
    });

    it('should return the empty snapshot for a corrupt file', async () => {
      await fs.mkdir(path.dirname(paths.hosts), { recursive: true });
      await fs.writeFile(paths.hosts, '{"hosts": [', 'utf8');
      await expect(store.load('hosts')).resolves.toEqual({ kind: 'hosts', elements: [], capturedAt: 0 });
    });

    it('should return the empty snapshot when the path is unreadable as a file', async () => {
      await fs.mkdir(paths.ports, { recursive: true });
      await expect(store.load('ports')).resolves.toEqual({ kind: 'ports', elements: [], capturedAt: 0 });
    });

    it('should read a legacy state file', async () => {
      await fs.mkdir(path.dirname(paths.ports), { recursive: true });
      await fs.writeFile(paths.ports, JSON.stringify({ ports: [80, 22], ts: 1700000000 }), 'utf8');
      await expect(store.load('ports')).resolves.toEqual({ kind: 'ports', elements: [22, 80], capturedAt: 1700000000 });
    });
  });

  describe('save', () => {
    it('should create missing directories and write a version 1 record', async () => {
      await store.save('hosts', { kind: 'hosts', elements: ['10.0.0.5', '10.0.0.6'], capturedAt: 1760000000 });

      const written = JSON.parse(await fs.readFile(paths.hosts, 'utf8'));
      expect(written).toEqual({ version: 1, kind: 'hosts', elements: ['10.0.0.5', '10.0.0.6'], capturedAt: 1760000000 });
    });

    it('should fully replace the previous record', async () => {
      await store.save('ports', { kind: 'ports', elements: [22, 80, 443], capturedAt: 1 });
      await store.save('ports', { kind: 'ports', elements: [22], capturedAt: 2 });

      await expect(store.load('ports')).resolves.toEqual({ kind: 'ports', elements: [22], capturedAt: 2 });
      expect(await fs.readdir(path.dirname(paths.ports))).toEqual(['ports.json']);
    });

    it('should throw when the record cannot be written', async () => {
      // A regular file where the state directory should be
      await fs.writeFile(path.join(dir, 'state'), 'not a directory', 'utf8');

      await expect(store.save('ports', { kind: 'ports', elements: [22], capturedAt: 1 })).rejects.toThrow(
        `Failed to persist ports snapshot to ${paths.ports}`
      );
    });
  });
});
