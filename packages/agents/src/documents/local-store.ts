import { promises as fs } from 'fs';
import path from 'path';

import { PermanentExternalError, TransientExternalError } from '@cadre/protocol';

import type { DocumentStore } from '../types.js';

const TRANSIENT_CODES = new Set(['EBUSY', 'EAGAIN', 'EMFILE', 'ENFILE', 'ETIMEDOUT']);

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Documents read from a local directory tree. References are paths relative
 * to the root and may not escape it.
 */
export class LocalDocumentStore implements DocumentStore {
  private root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  async fetch(ref: string): Promise<Buffer> {
    const fullPath = this.resolve(ref);
    try {
      return await fs.readFile(fullPath);
    } catch (error) {
      throw this.classify(ref, error);
    }
  }

  /**
   * Files directly inside `folder`, as references relative to the root
   */
  async list(folder: string): Promise<string[]> {
    const fullPath = this.resolve(folder);
    try {
      const entries = await fs.readdir(fullPath, { withFileTypes: true });
      return entries
        .filter((entry) => entry.isFile())
        .map((entry) => path.posix.join(folder.split(path.sep).join('/'), entry.name))
        .sort();
    } catch (error) {
      throw this.classify(folder, error);
    }
  }

  private resolve(ref: string): string {
    const fullPath = path.resolve(this.root, ref);
    if (fullPath !== this.root && !fullPath.startsWith(this.root + path.sep)) {
      throw new PermanentExternalError(`Document reference escapes the document root: ${ref}`);
    }
    return fullPath;
  }

  private classify(ref: string, error: unknown): Error {
    const code = errorCode(error);
    const message = `Could not read document ${ref}${code ? ` (${code})` : ''}`;
    if (code && TRANSIENT_CODES.has(code)) {
      return new TransientExternalError(message, { cause: error });
    }
    return new PermanentExternalError(message, { cause: error });
  }
}
