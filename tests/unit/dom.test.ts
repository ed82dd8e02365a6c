import { describe, expect, it } from 'vitest';
import {
  childElements,
  collapseParagraphRuns,
  countSections,
  createParagraphElement,
  getBody,
  getGridBefore,
  getGridSpan,
  getParagraphRuns,
  getParagraphStyle,
  getParagraphText,
  getRunText,
  insertSibling,
  normalizeLineBreaks,
  parseXml,
  serializeXml,
  setRunText,
} from '../../src/tools/docx/dom.js';
import { DocxError, DocxErrorCode } from '../../src/tools/docx/errors.js';
import { W_NS } from '../helpers/docx-builder.js';

function parseElement(xml: string): Element {
  return parseXml(xml.replace(/^<([\w:]+)/, `<$1 xmlns:w="${W_NS}"`)).documentElement;
}

describe('parseXml', () => {
  it('throws INVALID_DOCX naming the part for text that is not XML', () => {
    let caught: unknown;
    try {
      parseXml('this is not xml', 'word/document.xml');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(DocxError);
    expect(caught).toMatchObject({ code: DocxErrorCode.INVALID_DOCX });
    expect(caught instanceof Error ? caught.message : '').toMatch(/^Malformed word\/document\.xml/);
  });

  it('round-trips through serializeXml', () => {
    const doc = parseXml(`<w:p xmlns:w="${W_NS}"><w:r><w:t>Hi</w:t></w:r></w:p>`);
    expect(serializeXml(doc)).toBe(`<w:p xmlns:w="${W_NS}"><w:r><w:t>Hi</w:t></w:r></w:p>`);
  });
});

describe('getRunText', () => {
  it('maps tabs, breaks and non-breaking hyphens', () => {
    const run = parseElement(
      '<w:r><w:t>a</w:t><w:tab/><w:t>b</w:t><w:br/><w:noBreakHyphen/><w:br w:type="page"/><w:cr/></w:r>',
    );
    expect(getRunText(run)).toBe('a\tb\n-\n');
  });

  it('ignores run properties', () => {
    const run = parseElement('<w:r><w:rPr><w:b/></w:rPr><w:t>bold</w:t></w:r>');
    expect(getRunText(run)).toBe('bold');
  });
});

describe('setRunText', () => {
  it('keeps w:rPr and encodes tabs and line breaks as elements', () => {
    const run = parseElement('<w:r><w:rPr><w:b/></w:rPr><w:t>old</w:t></w:r>');
    setRunText(run, 'x\ty\nz');

    expect(childElements(run).map((el) => el.nodeName)).toEqual(['w:rPr', 'w:t', 'w:tab', 'w:t', 'w:br', 'w:t']);
    expect(getRunText(run)).toBe('x\ty\nz');
  });

  it('preserves surrounding whitespace', () => {
    const run = parseElement('<w:r><w:t>old</w:t></w:r>');
    setRunText(run, '  spaced  ');

    const t = childElements(run, 'w:t')[0];
    expect(t?.getAttribute('xml:space')).toBe('preserve');
    expect(getRunText(run)).toBe('  spaced  ');
  });

  it('writes one w:br per line break whatever the line ending', () => {
    const run = parseElement('<w:r><w:t>old</w:t></w:r>');
    setRunText(run, 'a\r\nb\rc');

    expect(childElements(run).map((el) => el.nodeName)).toEqual(['w:t', 'w:br', 'w:t', 'w:br', 'w:t']);
    expect(getRunText(run)).toBe('a\nb\nc');
    expect(getRunText(run)).toBe(normalizeLineBreaks('a\r\nb\rc'));
  });

  it('leaves only w:rPr for empty text', () => {
    const run = parseElement('<w:r><w:rPr><w:i/></w:rPr><w:t>gone</w:t></w:r>');
    setRunText(run, '');
    expect(childElements(run).map((el) => el.nodeName)).toEqual(['w:rPr']);
  });
});

describe('paragraph helpers', () => {
  const linked =
    '<w:p><w:r><w:t>a</w:t></w:r><w:hyperlink><w:r><w:t>b</w:t></w:r></w:hyperlink><w:r><w:t>c</w:t></w:r></w:p>';

  it('includes hyperlink runs in document order', () => {
    const p = parseElement(linked);
    expect(getParagraphRuns(p)).toHaveLength(3);
    expect(getParagraphText(p)).toBe('abc');
  });

  it('collapses to the first run and drops emptied hyperlinks', () => {
    const p = parseElement(linked);
    collapseParagraphRuns(p, 'xyz');

    expect(getParagraphRuns(p)).toHaveLength(1);
    expect(childElements(p, 'w:hyperlink')).toHaveLength(0);
    expect(getParagraphText(p)).toBe('xyz');
  });

  it('creates a run when collapsing a paragraph without runs', () => {
    const p = parseElement('<w:p><w:pPr><w:pStyle w:val="Title"/></w:pPr></w:p>');
    collapseParagraphRuns(p, 'new');

    expect(getParagraphRuns(p)).toHaveLength(1);
    expect(getParagraphText(p)).toBe('new');
  });

  it('reads the paragraph style id', () => {
    expect(getParagraphStyle(parseElement('<w:p><w:pPr><w:pStyle w:val="Heading2"/></w:pPr></w:p>'))).toBe(
      'Heading2',
    );
    expect(getParagraphStyle(parseElement('<w:p><w:r><w:t>x</w:t></w:r></w:p>'))).toBeNull();
  });

  it('builds paragraphs with and without a style', () => {
    const doc = parseXml(`<w:body xmlns:w="${W_NS}"/>`);

    const styled = createParagraphElement(doc, 'Title text', 'Title');
    expect(getParagraphStyle(styled)).toBe('Title');
    expect(getParagraphText(styled)).toBe('Title text');

    const plain = createParagraphElement(doc, 'Plain', null);
    expect(findPPr(plain)).toBe(false);
    expect(getParagraphText(plain)).toBe('Plain');
  });
});

function findPPr(p: Element): boolean {
  return childElements(p, 'w:pPr').length > 0;
}

describe('insertSibling', () => {
  it('inserts before and after an anchor', () => {
    const body = parseElement('<w:body><w:p><w:r><w:t>one</w:t></w:r></w:p><w:p><w:r><w:t>two</w:t></w:r></w:p></w:body>');
    const [first, second] = childElements(body, 'w:p');
    if (!first || !second) throw new Error('fixture paragraphs missing');

    insertSibling(first, createParagraphElement(body.ownerDocument, 'zero', null), 'before');
    insertSibling(second, createParagraphElement(body.ownerDocument, 'three', null), 'after');

    expect(childElements(body, 'w:p').map(getParagraphText)).toEqual(['zero', 'one', 'two', 'three']);
  });

  it('rejects a detached anchor', () => {
    const doc = parseXml(`<w:body xmlns:w="${W_NS}"/>`);
    const detached = createParagraphElement(doc, 'loose', null);
    expect(() => insertSibling(detached, createParagraphElement(doc, 'x', null), 'after')).toThrow(
      'Cannot insert next to a detached element',
    );
  });
});

describe('body and table helpers', () => {
  it('counts body and paragraph-level section breaks', () => {
    const doc = parseXml(
      `<w:document xmlns:w="${W_NS}"><w:body>` +
        '<w:p><w:pPr><w:sectPr/></w:pPr></w:p><w:p/><w:sectPr/>' +
        '</w:body></w:document>',
    );
    expect(countSections(getBody(doc))).toBe(2);
  });

  it('throws INVALID_DOCX without a body', () => {
    const doc = parseXml(`<w:document xmlns:w="${W_NS}"/>`);
    expect(() => getBody(doc)).toThrow('Invalid DOCX DOM: missing <w:body>');
  });

  it('reads grid spans and skipped grid columns with sane defaults', () => {
    expect(getGridSpan(parseElement('<w:tc><w:tcPr><w:gridSpan w:val="3"/></w:tcPr></w:tc>'))).toBe(3);
    expect(getGridSpan(parseElement('<w:tc><w:tcPr><w:gridSpan w:val="zero"/></w:tcPr></w:tc>'))).toBe(1);
    expect(getGridSpan(parseElement('<w:tc/>'))).toBe(1);
    expect(getGridBefore(parseElement('<w:tr><w:trPr><w:gridBefore w:val="2"/></w:trPr></w:tr>'))).toBe(2);
    expect(getGridBefore(parseElement('<w:tr/>'))).toBe(0);
  });
});
