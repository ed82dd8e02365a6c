/**
 * DOM utilities for DOCX XML manipulation.
 *
 * Single Responsibility: XML parsing, navigation, run-level text access and
 * minimal element mutation.  No file I/O: every function works on
 * in-memory DOM nodes.
 *
 * Uses @xmldom/xmldom for parsing and serialisation so that the
 * document-order of nodes is always preserved.
 */

import { DOMParser, XMLSerializer } from '@xmldom/xmldom';
import { logger } from '../../utils/logger.js';
import { DocxError, DocxErrorCode } from './errors.js';

// ═══════════════════════════════════════════════════════════════════════
// XML parse / serialize
// ═══════════════════════════════════════════════════════════════════════

/**
 * Parse an XML part. Parser errors are collected and raised as a single
 * DocxError instead of being printed and yielding a half-built tree.
 */
export function parseXml(xmlStr: string, partName = 'XML part'): Document {
    const problems: string[] = [];
    const parser = new DOMParser({
        errorHandler: {
            warning: (msg: string) => logger.debug(`${partName}: ${msg}`),
            error: (msg: string) => problems.push(msg),
            fatalError: (msg: string) => problems.push(msg),
        },
    });
    const doc = parser.parseFromString(xmlStr, 'application/xml');

    if (problems.length > 0 || !doc || !doc.documentElement) {
        throw new DocxError(
            `Malformed ${partName}${problems.length > 0 ? `: ${problems[0]}` : ''}`,
            DocxErrorCode.INVALID_DOCX,
            { partName, problems },
        );
    }
    return doc;
}

export function serializeXml(doc: Document): string {
    return new XMLSerializer().serializeToString(doc);
}

// ═══════════════════════════════════════════════════════════════════════
// Generic DOM helpers
// ═══════════════════════════════════════════════════════════════════════

export function isElement(node: Node): node is Element {
    return node.nodeType === 1;
}

/** Direct element children, optionally filtered by qualified name. */
export function childElements(parent: Node, nodeName?: string): Element[] {
    const out: Element[] = [];
    const nodes = parent.childNodes;
    for (let i = 0; i < nodes.length; i++) {
        const node = nodes.item(i);
        if (node && isElement(node) && (nodeName === undefined || node.nodeName === nodeName)) {
            out.push(node);
        }
    }
    return out;
}

/** Find the first direct child element with the given nodeName. */
export function findDirectChild(parent: Node, nodeName: string): Element | null {
    return childElements(parent, nodeName)[0] ?? null;
}

// ═══════════════════════════════════════════════════════════════════════
// Body access
// ═══════════════════════════════════════════════════════════════════════

/** Return the single <w:body> element from a parsed document.xml DOM. */
export function getBody(doc: Document): Element {
    const body = doc.getElementsByTagName('w:body').item(0);
    if (!body) throw new DocxError('Invalid DOCX DOM: missing <w:body>', DocxErrorCode.INVALID_DOCX);
    return body;
}

/**
 * Count document sections: the body-level w:sectPr plus every w:sectPr
 * that closes a section inside a body paragraph's properties.
 */
export function countSections(body: Element): number {
    let count = childElements(body, 'w:sectPr').length;
    for (const p of childElements(body, 'w:p')) {
        const pPr = findDirectChild(p, 'w:pPr');
        if (pPr && findDirectChild(pPr, 'w:sectPr')) count++;
    }
    return count;
}

// ═══════════════════════════════════════════════════════════════════════
// Runs
// ═══════════════════════════════════════════════════════════════════════

/**
 * Runs that make up a paragraph's visible text, in document order:
 * direct w:r children and the runs of w:hyperlink children.
 */
export function getParagraphRuns(p: Element): Element[] {
    const runs: Element[] = [];
    for (const child of childElements(p)) {
        if (child.nodeName === 'w:r') {
            runs.push(child);
        } else if (child.nodeName === 'w:hyperlink') {
            runs.push(...childElements(child, 'w:r'));
        }
    }
    return runs;
}

/**
 * Text of a run as a reader sees it: w:t text, tabs as "\t",
 * line breaks as "\n" and non-breaking hyphens as "-".
 */
export function getRunText(r: Element): string {
    let out = '';
    for (const child of childElements(r)) {
        switch (child.nodeName) {
            case 'w:t':
                out += child.textContent ?? '';
                break;
            case 'w:tab':
            case 'w:ptab':
                out += '\t';
                break;
            case 'w:br': {
                const type = child.getAttribute('w:type');
                if (!type || type === 'textWrapping') out += '\n';
                break;
            }
            case 'w:cr':
                out += '\n';
                break;
            case 'w:noBreakHyphen':
                out += '-';
                break;
        }
    }
    return out;
}

/** "\r\n" and a lone "\r" become "\n", the only line break a run stores. */
export function normalizeLineBreaks(text: string): string {
    return text.replace(/\r\n?/g, '\n');
}

/**
 * Replace the content of a run with `text`, keeping its w:rPr.
 * "\t" becomes w:tab, line breaks (see normalizeLineBreaks) become one w:br
 * each, everything else goes into w:t elements with xml:space="preserve".
 */
export function setRunText(r: Element, text: string): void {
    const doc = r.ownerDocument;
    for (const child of childElements(r)) {
        if (child.nodeName !== 'w:rPr') r.removeChild(child);
    }

    let pending = '';
    const flush = (): void => {
        if (!pending) return;
        const t = doc.createElement('w:t');
        t.setAttribute('xml:space', 'preserve');
        t.appendChild(doc.createTextNode(pending));
        r.appendChild(t);
        pending = '';
    };

    for (const ch of normalizeLineBreaks(text)) {
        if (ch === '\t') {
            flush();
            r.appendChild(doc.createElement('w:tab'));
        } else if (ch === '\n') {
            flush();
            r.appendChild(doc.createElement('w:br'));
        } else {
            pending += ch;
        }
    }
    flush();
}

// ═══════════════════════════════════════════════════════════════════════
// Paragraph helpers
// ═══════════════════════════════════════════════════════════════════════

/** Concatenated text of every run of a paragraph. */
export function getParagraphText(p: Element): string {
    return getParagraphRuns(p).map(getRunText).join('');
}

/** Read the style id from w:pPr/w:pStyle/@w:val, or null if absent. */
export function getParagraphStyle(p: Element): string | null {
    const pPr = findDirectChild(p, 'w:pPr');
    if (!pPr) return null;
    const pStyle = findDirectChild(pPr, 'w:pStyle');
    return pStyle ? pStyle.getAttribute('w:val') : null;
}

/**
 * Build a detached paragraph: <w:p>[<w:pPr><w:pStyle/></w:pPr>]<w:r>…</w:r></w:p>
 */
export function createParagraphElement(doc: Document, text: string, styleId: string | null): Element {
    const p = doc.createElement('w:p');

    if (styleId) {
        const pPr = doc.createElement('w:pPr');
        const pStyle = doc.createElement('w:pStyle');
        pStyle.setAttribute('w:val', styleId);
        pPr.appendChild(pStyle);
        p.appendChild(pPr);
    }

    const r = doc.createElement('w:r');
    setRunText(r, text);
    p.appendChild(r);
    return p;
}

/**
 * Collapse a paragraph to a single run holding `text`.
 *
 * The first run survives with its w:rPr; every other run is removed, as is
 * any hyperlink left without runs. A run is created when the paragraph has
 * none.
 */
export function collapseParagraphRuns(p: Element, text: string): void {
    const runs = getParagraphRuns(p);

    if (runs.length === 0) {
        const r = p.ownerDocument.createElement('w:r');
        setRunText(r, text);
        p.appendChild(r);
        return;
    }

    for (const r of runs.slice(1)) {
        r.parentNode?.removeChild(r);
    }
    for (const link of childElements(p, 'w:hyperlink')) {
        if (childElements(link, 'w:r').length === 0) p.removeChild(link);
    }
    setRunText(runs[0], text);
}

/** Insert `node` right before or right after `anchor` among its siblings. */
export function insertSibling(anchor: Element, node: Element, position: 'before' | 'after'): void {
    const parent = anchor.parentNode;
    if (!parent) {
        throw new DocxError('Cannot insert next to a detached element', DocxErrorCode.DOCX_EDIT_FAILED);
    }

    if (position === 'before') {
        parent.insertBefore(node, anchor);
        return;
    }

    const nextSibling = anchor.nextSibling;
    if (nextSibling) {
        parent.insertBefore(node, nextSibling);
    } else {
        parent.appendChild(node);
    }
}

// ═══════════════════════════════════════════════════════════════════════
// Table helpers
// ═══════════════════════════════════════════════════════════════════════

/** Number of grid columns a cell covers (w:tcPr/w:gridSpan), at least 1. */
export function getGridSpan(tc: Element): number {
    const tcPr = findDirectChild(tc, 'w:tcPr');
    const span = tcPr ? findDirectChild(tcPr, 'w:gridSpan') : null;
    const value = span ? Number.parseInt(span.getAttribute('w:val') ?? '', 10) : NaN;
    return Number.isFinite(value) && value > 0 ? value : 1;
}

/** Grid columns skipped before the first cell of a row (w:trPr/w:gridBefore). */
export function getGridBefore(tr: Element): number {
    const trPr = findDirectChild(tr, 'w:trPr');
    const before = trPr ? findDirectChild(trPr, 'w:gridBefore') : null;
    const value = before ? Number.parseInt(before.getAttribute('w:val') ?? '', 10) : NaN;
    return Number.isFinite(value) && value > 0 ? value : 0;
}

/** Column count from w:tblGrid, or null when the table has no grid. */
export function getGridColumnCount(tbl: Element): number | null {
    const grid = findDirectChild(tbl, 'w:tblGrid');
    if (!grid) return null;
    return childElements(grid, 'w:gridCol').length;
}
