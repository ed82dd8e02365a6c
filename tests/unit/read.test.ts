import fs from 'fs/promises';
import path from 'path';
import JSZip from 'jszip';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  countWords,
  extractDocumentText,
  getDocumentProperties,
  getDocumentStructure,
  getDocumentXml,
  truncateText,
} from '../../src/tools/docx/read.js';
import {
  SECTION_PROPERTIES,
  bodyOf,
  coreXml,
  documentXml,
  makeTempDir,
  paragraphXml,
  removeTempDir,
  tableXml,
  writeDocx,
} from '../helpers/docx-builder.js';

describe('text helpers', () => {
  it('counts whitespace-separated words', () => {
    expect(countWords('  one two\tthree\nfour  ')).toBe(4);
    expect(countWords('')).toBe(0);
  });

  it('truncates with a marker only when text is too long', () => {
    expect(truncateText('abcdef', 3)).toBe('abc...');
    expect(truncateText('abc', 3)).toBe('abc');
  });

  it('counts code points, not UTF-16 units', () => {
    expect(truncateText('😀😀😀', 2)).toBe('😀😀...');
  });
});

describe('read operations', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  describe('getDocumentProperties', () => {
    it('combines core properties with document statistics', async () => {
      const table = tableXml({ rows: [['not counted as body words']] });
      const filePath = await writeDocx(dir, 'props.docx', {
        body: paragraphXml('Hello brave world') + table + paragraphXml('Two words') + SECTION_PROPERTIES,
        core: coreXml({
          title: 'Report',
          creator: 'Author Name',
          subject: 'Testing',
          keywords: 'alpha beta',
          lastModifiedBy: 'Reviewer',
          revision: '3',
          created: '2024-05-06T07:08:09Z',
        }),
      });

      const result = await getDocumentProperties(filePath);

      expect(result).toEqual({
        ok: true,
        value: {
          title: 'Report',
          author: 'Author Name',
          subject: 'Testing',
          keywords: 'alpha beta',
          created: '2024-05-06T07:08:09.000Z',
          modified: '',
          lastModifiedBy: 'Reviewer',
          revision: 3,
          pageCount: 1,
          wordCount: 5,
          paragraphCount: 2,
          tableCount: 1,
        },
      });
    });

    it('reports a missing document without a prefix', async () => {
      const missing = path.join(dir, 'missing.docx');

      expect(await getDocumentProperties(missing)).toEqual({
        ok: false,
        code: 'DOCUMENT_NOT_FOUND',
        error: `Document ${missing} does not exist`,
      });
    });

    it('reports an unreadable package with the operation prefix', async () => {
      const filePath = path.join(dir, 'broken.docx');
      await fs.writeFile(filePath, 'not a zip archive');

      const result = await getDocumentProperties(filePath);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.code).toBe('INVALID_DOCX');
      expect(result.error.startsWith('Failed to get document properties: ')).toBe(true);
    });
  });

  describe('extractDocumentText', () => {
    it('joins body paragraphs, then table-cell paragraphs, with newlines', async () => {
      const filePath = await writeDocx(dir, 'text.docx', {
        body: paragraphXml('A') + tableXml({ rows: [['C']] }) + paragraphXml('B') + SECTION_PROPERTIES,
      });

      expect(await extractDocumentText(filePath)).toEqual({ ok: true, value: 'A\nB\nC' });
    });

    it('returns an empty string for an empty body', async () => {
      const filePath = await writeDocx(dir, 'empty.docx', { body: SECTION_PROPERTIES });
      expect(await extractDocumentText(filePath)).toEqual({ ok: true, value: '' });
    });

    it('fails on a missing document', async () => {
      const missing = path.join(dir, 'nope.docx');
      expect(await extractDocumentText(missing)).toEqual({
        ok: false,
        code: 'DOCUMENT_NOT_FOUND',
        error: `Document ${missing} does not exist`,
      });
    });
  });

  describe('getDocumentStructure', () => {
    it('previews paragraphs with style names and truncated text', async () => {
      const long = 'x'.repeat(150);
      const exact = 'y'.repeat(100);
      const filePath = await writeDocx(dir, 'outline.docx', {
        body: bodyOf({ runs: ['Chapter One'], styleId: 'Heading1' }, long, exact, { runs: ['Quoted'], styleId: 'Quote' }),
      });

      const result = await getDocumentStructure(filePath);

      expect(result).toEqual({
        ok: true,
        value: {
          paragraphs: [
            { index: 0, text: 'Chapter One', style: 'Heading 1' },
            { index: 1, text: `${'x'.repeat(100)}...`, style: 'Normal' },
            { index: 2, text: exact, style: 'Normal' },
            { index: 3, text: 'Quoted', style: 'Quote' },
          ],
          tables: [],
        },
      });
    });

    it('previews the first three rows and columns of each table', async () => {
      const table = tableXml({
        gridColumns: 4,
        rows: [
          ['Name', 'Value', 'A very long cell value here', 'hidden'],
          ['short'],
          ['r3', 'r3b', 'r3c', 'r3d'],
          ['r4', 'r4b', 'r4c', 'r4d'],
        ],
      });
      const filePath = await writeDocx(dir, 'table.docx', { body: table + SECTION_PROPERTIES });

      const result = await getDocumentStructure(filePath);

      expect(result).toEqual({
        ok: true,
        value: {
          paragraphs: [],
          tables: [
            {
              index: 0,
              rows: 4,
              columns: 4,
              preview: [
                ['Name', 'Value', 'A very long cell val...'],
                ['short', 'N/A', 'N/A'],
                ['r3', 'r3b', 'r3c'],
              ],
            },
          ],
        },
      });
    });
  });

  describe('getDocumentXml', () => {
    it('returns word/document.xml verbatim', async () => {
      const body = bodyOf({ runs: [{ text: 'Bold', bold: true }, ' & plain'] });
      const filePath = await writeDocx(dir, 'raw.docx', { body });

      expect(await getDocumentXml(filePath)).toEqual({ ok: true, value: documentXml(body) });
    });

    it('fails when the package has no main document part', async () => {
      const zip = new JSZip();
      zip.file('[Content_Types].xml', '<Types/>');
      const filePath = path.join(dir, 'hollow.docx');
      await fs.writeFile(filePath, await zip.generateAsync({ type: 'nodebuffer' }));

      expect(await getDocumentXml(filePath)).toEqual({
        ok: false,
        code: 'INVALID_DOCX',
        error: "Failed to extract XML: There is no item named 'word/document.xml' in the archive",
      });
    });
  });
});
