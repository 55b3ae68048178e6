import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'url';
import { readDocuments } from '../../src/lib/reader/index.js';
import { DocumentParseError, FileIOError } from '../../src/utils/errors.js';

const doc = (name: string) =>
  fileURLToPath(new URL(`../fixtures/documents/${name}`, import.meta.url));

describe('readDocuments', () => {
  it('should read and parse documents in order', async () => {
    const { documents, skipped } = await readDocuments([doc('rss.xml'), doc('catalog.xml')]);

    expect(documents.map((loaded) => loaded.tree.documentElement?.name)).toEqual(['rss', 'catalog']);
    expect(documents[0]?.path).toBe(doc('rss.xml'));
    expect(skipped).toEqual([]);
  });

  it('should fail on the first malformed document', async () => {
    await expect(readDocuments([doc('broken.xml'), doc('rss.xml')])).rejects.toBeInstanceOf(
      DocumentParseError,
    );
  });

  it('should skip unreadable documents when errors are ignored', async () => {
    const { documents, skipped } = await readDocuments(
      [doc('broken.xml'), doc('missing.xml'), doc('catalog.xml')],
      { ignoreErrors: true },
    );

    expect(documents).toHaveLength(1);
    expect(skipped.map((entry) => entry.path)).toEqual([doc('broken.xml'), doc('missing.xml')]);
    expect(skipped[1]?.reason).toBe(`Failed to read file: ${doc('missing.xml')}`);
  });

  it('should enforce the maximum file size', async () => {
    const path = doc('catalog.xml');
    await expect(readDocuments([path], { maximumFileSize: 10 })).rejects.toThrow(
      `File exceeds maximum size of 10 bytes: ${path}`,
    );
    await expect(readDocuments([path], { maximumFileSize: 10 })).rejects.toBeInstanceOf(FileIOError);
  });

  it('should parse HTML leniently', async () => {
    const { documents } = await readDocuments([doc('page.html')], { mode: 'html' });
    const table = documents[0]?.tree.documentElement;

    expect(table?.name).toBe('table');
    expect(table?.children.map((row) => row.children.map((cell) => cell.text))).toEqual([
      ['alpha', '1'],
      ['beta', '2'],
    ]);
  });
});
