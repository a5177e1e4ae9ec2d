/**
 * Key/value store tests
 */

import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import {
  FileKeyValueStore,
  InMemoryKeyValueStore,
} from '../../src/services/key-value-store.service';

describe('InMemoryKeyValueStore', () => {
  it('should read back, list and remove values', async () => {
    const store = new InMemoryKeyValueStore();

    await store.setString('a', '1');
    await store.setString('b', '2');
    await store.remove('a');

    expect(await store.getString('a')).toBeNull();
    expect(await store.getString('b')).toBe('2');
    expect(await store.keys()).toEqual(['b']);
  });
});

describe('FileKeyValueStore', () => {
  let dir: string;
  let filePath: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'ckd-store-'));
    filePath = path.join(dir, 'nested', 'store.json');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should start empty when the file does not exist', async () => {
    const store = new FileKeyValueStore(filePath);

    expect(await store.keys()).toEqual([]);
  });

  it('should persist values for the next instance', async () => {
    const store = new FileKeyValueStore(filePath);
    await store.setString('queue', '[]');
    await store.setString('settings', '{"snoozeEnabled":false}');
    await store.remove('queue');

    const reopened = new FileKeyValueStore(filePath);

    expect(await reopened.keys()).toEqual(['settings']);
    expect(await reopened.getString('settings')).toBe('{"snoozeEnabled":false}');
    expect(JSON.parse(await fs.readFile(filePath, 'utf8'))).toEqual({
      settings: '{"snoozeEnabled":false}',
    });
  });

  it('should keep concurrent writes', async () => {
    const store = new FileKeyValueStore(filePath);

    await Promise.all([
      store.setString('a', '1'),
      store.setString('b', '2'),
      store.setString('c', '3'),
    ]);

    const reopened = new FileKeyValueStore(filePath);
    expect((await reopened.keys()).sort()).toEqual(['a', 'b', 'c']);
  });

  it('should start empty from a corrupt file and drop non-string values', async () => {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, '{not json', 'utf8');

    expect(await new FileKeyValueStore(filePath).keys()).toEqual([]);

    await fs.writeFile(filePath, JSON.stringify({ kept: 'yes', dropped: 3 }), 'utf8');
    const store = new FileKeyValueStore(filePath);
    expect(await store.keys()).toEqual(['kept']);
  });
});
