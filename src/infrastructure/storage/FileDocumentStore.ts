import { promises as fs } from 'fs';
import path from 'path';
import { IDocumentStore } from '../../core/interfaces/IDocumentStore.js';
import { errorMessage } from '../../core/errors.js';
import { atomicWrite } from '../../utils/atomicWrite.js';
import { isNotFound } from '../../utils/fsErrors.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('store');

/**
 * JSON-file implementation of the document store.
 *
 * Each key maps to exactly one file, `<rootDir>/<key>.json`. Keys are flat: a `/`
 * in a key is escaped, never a sub-directory. Separate namespaces get separate stores.
 * The root directory is created on first write.
 */
export class FileDocumentStore implements IDocumentStore {
  private rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = path.resolve(rootDir);
  }

  getRootDir(): string {
    return this.rootDir;
  }

  pathFor(key: string): string {
    return path.join(this.rootDir, `${encodeKey(key)}.json`);
  }

  async load(key: string): Promise<unknown> {
    const filePath = this.pathFor(key);

    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return undefined;
      }
      log.error('Failed to read document', { key, filePath, error: errorMessage(error) });
      return undefined;
    }

    try {
      return JSON.parse(raw);
    } catch (error) {
      log.warn('Ignoring corrupt document', { key, filePath, error: errorMessage(error) });
      return undefined;
    }
  }

  async save(key: string, document: unknown): Promise<void> {
    const filePath = this.pathFor(key);
    await fs.mkdir(this.rootDir, { recursive: true });
    await atomicWrite(filePath, JSON.stringify(document, null, 2));
  }

  async delete(key: string): Promise<void> {
    await fs.rm(this.pathFor(key), { force: true });
  }
}

/**
 * Keeps every key a single file name inside the root: separators and dot-only names are escaped
 */
function encodeKey(key: string): string {
  if (key === '') {
    return '_';
  }
  const encoded = encodeURIComponent(key);
  return /^\.+$/.test(encoded) ? encoded.replace(/\./g, '%2E') : encoded;
}
