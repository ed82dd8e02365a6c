import fs from 'fs/promises';
import path from 'path';
import { Document, HeadingLevel, Packer, Paragraph, Table, TableCell, TableRow, TextRun } from 'docx';
import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';
import { openDocument } from '../../src/tools/docx/document.js';
import { findAndReplaceText } from '../../src/tools/docx/ops/find-and-replace-text.js';
import { insertLineOrParagraphNearText } from '../../src/tools/docx/ops/insert-paragraph-near-text.js';
import { getDocumentProperties, getDocumentStructure } from '../../src/tools/docx/read.js';
import { makeTempDir, removeTempDir } from '../helpers/docx-builder.js';

async function writeGeneratedDocument(filePath: string): Promise<void> {
  const doc = new Document({
    creator: 'Fixture Author',
    title: 'Generated',
    sections: [
      {
        children: [
          new Paragraph({ text: 'Generated heading', heading: HeadingLevel.HEADING_1 }),
          new Paragraph({ children: [new TextRun({ text: 'Hello ', bold: true }), new TextRun('generated world')] }),
          new Table({
            rows: [
              new TableRow({
                children: [
                  new TableCell({ children: [new Paragraph('cell one')] }),
                  new TableCell({ children: [new Paragraph('cell two')] }),
                ],
              }),
            ],
          }),
        ],
      },
    ],
  });
  await fs.writeFile(filePath, await Packer.toBuffer(doc));
}

describe('documents produced by another writer', () => {
  let dir: string;
  let filePath: string;
  let stderr: MockInstance<typeof process.stderr.write>;

  beforeEach(async () => {
    dir = await makeTempDir();
    stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    filePath = path.join(dir, 'generated.docx');
    await writeGeneratedDocument(filePath);
  });

  afterEach(async () => {
    stderr.mockRestore();
    await removeTempDir(dir);
  });

  it('reads paragraphs, runs and tables', async () => {
    const doc = await openDocument(filePath);

    expect(doc.paragraphs.map((p) => p.text)).toEqual(['Generated heading', 'Hello generated world']);
    expect(doc.paragraphs[1]?.runs.map((r) => r.text)).toEqual(['Hello ', 'generated world']);
    expect(doc.tables[0]?.rows[0]?.cells.map((c) => c.text)).toEqual(['cell one', 'cell two']);
  });

  it('resolves the heading style name', async () => {
    const result = await getDocumentStructure(filePath);

    expect(result.ok && result.value.paragraphs[0]).toEqual({ index: 0, text: 'Generated heading', style: 'Heading 1' });
  });

  it('reads core properties', async () => {
    const result = await getDocumentProperties(filePath);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.title).toBe('Generated');
    expect(result.value.author).toBe('Fixture Author');
    expect(result.value.tableCount).toBe(1);
  });

  it('replaces across runs and saves a package that reopens', async () => {
    const doc = await openDocument(filePath);
    expect(findAndReplaceText(doc, 'Hello generated', 'Goodbye')).toBe(1);
    await doc.save(filePath);

    const reopened = await openDocument(filePath);
    expect(reopened.paragraphs[1]?.text).toBe('Goodbye world');
    expect(reopened.paragraphs[1]?.runs).toHaveLength(1);
  });

  it('inserts a paragraph with the anchor heading style', async () => {
    const result = await insertLineOrParagraphNearText(filePath, 'Generated heading', 'Second heading');

    expect(result.status).toBe('inserted');
    const reopened = await openDocument(filePath);
    expect(reopened.paragraphs.map((p) => [p.text, p.styleName])).toEqual([
      ['Generated heading', 'Heading 1'],
      ['Second heading', 'Heading 1'],
      ['Hello generated world', reopened.paragraphs[2]?.styleName ?? ''],
    ]);
  });
});
