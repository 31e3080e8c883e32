import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { PermanentExternalError } from '@cadre/protocol';
import { LocalDocumentStore } from '@cadre/agents';

describe('LocalDocumentStore', () => {
  let root: string;
  let store: LocalDocumentStore;

  beforeAll(async () => {
    root = await mkdtemp(path.join(tmpdir(), 'cadre-docs-'));
    await mkdir(path.join(root, 'budgets', 'archive'), { recursive: true });
    await writeFile(path.join(root, 'budgets', 'fy26.md'), 'Budget FY26');
    await writeFile(path.join(root, 'budgets', 'a-notes.md'), 'Notes');
    store = new LocalDocumentStore(root);
  });

  afterAll(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('reads a document by relative reference', async () => {
    expect((await store.fetch('budgets/fy26.md')).toString('utf8')).toBe('Budget FY26');
  });

  it('lists files directly inside a folder', async () => {
    expect(await store.list('budgets')).toEqual(['budgets/a-notes.md', 'budgets/fy26.md']);
  });

  it('refuses references outside the root', async () => {
    await expect(store.fetch('../secrets.txt')).rejects.toThrow(
      'Document reference escapes the document root: ../secrets.txt',
    );
  });

  it('reports a missing document as permanent', async () => {
    const error = await store.fetch('budgets/missing.md').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PermanentExternalError);
    expect(error).toMatchObject({ message: 'Could not read document budgets/missing.md (ENOENT)' });
  });
});
