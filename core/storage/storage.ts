/**
 * Storage reader/writer contract and its two implementations.
 *
 * Reads never throw: they return a ReadResult so the buffer can fall back
 * to a blank document. Writes throw StorageError.
 */

import { closeSync, constants, ftruncateSync, openSync, readFileSync, writeSync } from 'node:fs';
import { StorageError } from './errors';

export type ReadResult =
  | { ok: true; bytes: Uint8Array }
  | { ok: false; error: StorageError };

export interface Storage {
  read(path: string): ReadResult;
  /** Create if absent, truncate to exactly `bytes.length`, then write. */
  write(path: string, bytes: Uint8Array): void;
}

export class FileStorage implements Storage {
  read(path: string): ReadResult {
    try {
      return { ok: true, bytes: readFileSync(path) };
    } catch (err) {
      return { ok: false, error: new StorageError('read', path, err) };
    }
  }

  write(path: string, bytes: Uint8Array): void {
    let fd: number;
    try {
      fd = openSync(path, constants.O_WRONLY | constants.O_CREAT);
    } catch (err) {
      throw new StorageError('write', path, err);
    }
    try {
      ftruncateSync(fd, bytes.length);
      let written = 0;
      while (written < bytes.length) {
        written += writeSync(fd, bytes, written, bytes.length - written, written);
      }
    } catch (err) {
      throw new StorageError('write', path, err);
    } finally {
      closeSync(fd);
    }
  }
}

/**
 * In-process storage keyed by path. Paths listed in `readOnly` reject
 * writes, which lets tests exercise the save failure path.
 */
export class MemoryStorage implements Storage {
  private files: Map<string, Uint8Array> = new Map();
  readonly readOnly: Set<string> = new Set();

  constructor(initial: Record<string, string> = {}) {
    for (const [path, text] of Object.entries(initial)) {
      this.files.set(path, new TextEncoder().encode(text));
    }
  }

  read(path: string): ReadResult {
    const bytes = this.files.get(path);
    if (!bytes) {
      return { ok: false, error: new StorageError('read', path, new Error('no such file')) };
    }
    return { ok: true, bytes: bytes.slice() };
  }

  write(path: string, bytes: Uint8Array): void {
    if (this.readOnly.has(path)) {
      throw new StorageError('write', path, new Error('permission denied'));
    }
    this.files.set(path, bytes.slice());
  }

  has(path: string): boolean {
    return this.files.has(path);
  }

  /** Stored content decoded as UTF-8, or null when absent. */
  getText(path: string): string | null {
    const bytes = this.files.get(path);
    return bytes ? new TextDecoder().decode(bytes) : null;
  }
}
