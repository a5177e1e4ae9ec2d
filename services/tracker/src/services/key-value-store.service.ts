/**
 * Local key/value store
 * Device-local state (notification index, offline queue, notification settings)
 * kept outside Firestore so it survives connectivity loss
 */

import { promises as fs } from 'fs';
import path from 'path';
import logger from '../logger';
import { errorMessage } from '../utils/error-utils';

const log = logger.child({ module: 'key-value-store' });

export interface KeyValueStore {
  getString(key: string): Promise<string | null>;
  setString(key: string, value: string): Promise<void>;
  remove(key: string): Promise<void>;
  keys(): Promise<string[]>;
}

export class InMemoryKeyValueStore implements KeyValueStore {
  private readonly values = new Map<string, string>();

  async getString(key: string): Promise<string | null> {
    return this.values.get(key) ?? null;
  }

  async setString(key: string, value: string): Promise<void> {
    this.values.set(key, value);
  }

  async remove(key: string): Promise<void> {
    this.values.delete(key);
  }

  async keys(): Promise<string[]> {
    return [...this.values.keys()];
  }
}

/**
 * JSON-file backed store
 * The whole map is loaded once and rewritten on every change via temp file + rename.
 * Writes are chained so concurrent callers never interleave partial files.
 */
export class FileKeyValueStore implements KeyValueStore {
  private values: Map<string, string> | null = null;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  async getString(key: string): Promise<string | null> {
    const values = await this.load();
    return values.get(key) ?? null;
  }

  async setString(key: string, value: string): Promise<void> {
    const values = await this.load();
    values.set(key, value);
    await this.persist();
  }

  async remove(key: string): Promise<void> {
    const values = await this.load();
    if (values.delete(key)) {
      await this.persist();
    }
  }

  async keys(): Promise<string[]> {
    const values = await this.load();
    return [...values.keys()];
  }

  private async load(): Promise<Map<string, string>> {
    if (this.values) {
      return this.values;
    }

    const loaded = new Map<string, string>();
    try {
      const raw = await fs.readFile(this.filePath, 'utf8');
      const parsed: unknown = JSON.parse(raw);
      if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
        for (const [key, value] of Object.entries(parsed)) {
          if (typeof value === 'string') {
            loaded.set(key, value);
          }
        }
      }
    } catch (error) {
      const code = error instanceof Error && 'code' in error ? error.code : undefined;
      if (code !== 'ENOENT') {
        log.warn(
          { filePath: this.filePath, error: errorMessage(error) },
          'Local store unreadable, starting empty'
        );
      }
    }

    this.values = loaded;
    return loaded;
  }

  private persist(): Promise<void> {
    const snapshot = JSON.stringify(Object.fromEntries(this.values ?? []));
    const write = async (): Promise<void> => {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      const tempPath = `${this.filePath}.tmp`;
      await fs.writeFile(tempPath, snapshot, 'utf8');
      await fs.rename(tempPath, this.filePath);
    };
    this.writeChain = this.writeChain.then(write, write);
    return this.writeChain;
  }
}
