import * as fs from 'fs/promises';
import * as path from 'path';
import { ILogger } from '../../domain/common/ILogger';
import { StorageError, errorMessage } from '../../domain/common/Errors';

export interface DocumentUpdate<T> {
  doc: T;
  written: boolean;
}

/**
 * One directory per collection, one JSON file per document, mirrored in an
 * in-memory Map. Writes go to a temp file that is renamed over the target,
 * so a document is replaced whole or not at all.
 */
export class JsonDocumentStore<T> {
  private readonly dir: string;
  private readonly documents = new Map<string, T>();
  private initialized = false;
  private initializing: Promise<void> | null = null;
  private readonly writes = new Map<string, Promise<void>>();
  private writeSeq = 0;

  constructor(
    dataDir: string,
    private readonly collection: string,
    private readonly keyOf: (doc: T) => string,
    private readonly logger: ILogger
  ) {
    this.dir = path.join(dataDir, collection);
  }

  /**
   * Load every document of the collection into memory.
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;
    if (!this.initializing) {
      this.initializing = this.load().finally(() => {
        this.initializing = null;
      });
    }
    await this.initializing;
  }

  private async load(): Promise<void> {
    try {
      await fs.mkdir(this.dir, { recursive: true });
      const files = await fs.readdir(this.dir);

      for (const file of files.filter(f => f.endsWith('.json'))) {
        try {
          const data = await fs.readFile(path.join(this.dir, file), 'utf-8');
          const doc: T = JSON.parse(data);
          this.documents.set(this.keyOf(doc), doc);
        } catch (err) {
          this.logger.warn(`Failed to load ${this.collection} file: ${file}`, { error: errorMessage(err) });
        }
      }

      this.logger.info(`Loaded ${this.documents.size} ${this.collection}`);
      this.initialized = true;
    } catch (err) {
      throw new StorageError(`Failed to initialize ${this.collection} store`, err);
    }
  }

  private fileFor(key: string): string {
    return path.join(this.dir, `${encodeURIComponent(key)}.json`);
  }

  async get(key: string): Promise<T | null> {
    await this.initialize();
    return this.documents.get(key) ?? null;
  }

  async all(): Promise<T[]> {
    await this.initialize();
    return Array.from(this.documents.values());
  }

  /**
   * Persist a document, then publish it to the in-memory view.
   */
  async put(doc: T): Promise<T> {
    await this.initialize();
    const key = this.keyOf(doc);
    return this.serialize(key, async () => {
      await this.write(key, doc);
      return doc;
    });
  }

  /**
   * Read-modify-write a single document. Writes to one key run in call order,
   * so `change` always sees the result of the previous write. Returning
   * `current` unchanged skips the write; anything `change` throws is rethrown.
   */
  async update(key: string, change: (current: T | null) => T): Promise<DocumentUpdate<T>> {
    await this.initialize();
    return this.serialize(key, async () => {
      const current = this.documents.get(key) ?? null;
      const next = change(current);
      if (next === current) {
        return { doc: next, written: false };
      }
      await this.write(key, next);
      return { doc: next, written: true };
    });
  }

  private serialize<R>(key: string, work: () => Promise<R>): Promise<R> {
    const previous = this.writes.get(key) ?? Promise.resolve();
    const result = previous.then(work);
    const tail: Promise<void> = result.then(settle, settle).then(() => {
      if (this.writes.get(key) === tail) this.writes.delete(key);
    });
    this.writes.set(key, tail);
    return result;
  }

  private async write(key: string, doc: T): Promise<void> {
    const target = this.fileFor(key);
    this.writeSeq += 1;
    const temp = `${target}.${process.pid}.${this.writeSeq}.tmp`;

    try {
      await fs.writeFile(temp, JSON.stringify(doc, null, 2));
      await fs.rename(temp, target);
    } catch (err) {
      await fs.rm(temp, { force: true }).catch((cleanupErr: unknown) => {
        this.logger.warn(`Failed to remove temp file: ${temp}`, { error: errorMessage(cleanupErr) });
      });
      throw new StorageError(`Failed to write ${this.collection}/${key}`, err);
    }

    this.documents.set(key, doc);
  }

  async count(): Promise<number> {
    await this.initialize();
    return this.documents.size;
  }
}

function settle(): void {}
