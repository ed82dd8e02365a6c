/**
 * WordDocument adapter over word/document.xml.
 *
 * Exposes the body as paragraphs → runs and tables → rows → cells →
 * paragraphs. Every object wraps the live DOM node, so mutations made
 * through it land in the XML that `save()` writes back.
 */

import type PizZip from 'pizzip';
import { DOCX_PATHS } from './constants.js';
import {
    childElements,
    collapseParagraphRuns,
    countSections,
    createParagraphElement,
    getBody,
    getGridBefore,
    getGridColumnCount,
    getGridSpan,
    getParagraphRuns,
    getParagraphStyle,
    getParagraphText,
    getRunText,
    insertSibling,
    parseXml,
    serializeXml,
    setRunText,
} from './dom.js';
import { DocxError, DocxErrorCode, withErrorContext } from './errors.js';
import { parseCoreProperties } from './extractors/metadata.js';
import { StyleCatalogue, type StyleEntry } from './styles.js';
import type {
    CoreProperties,
    InsertPosition,
    WordDocument,
    WordParagraph,
    WordRun,
    WordTable,
    WordTableCell,
    WordTableRow,
} from './types.js';
import { getDocumentXml, loadDocxZip, readZipFileText, saveDocxZip } from './zip.js';

class XmlRun implements WordRun {
    constructor(readonly element: Element) {}

    get text(): string {
        return getRunText(this.element);
    }

    set text(value: string) {
        setRunText(this.element, value);
    }
}

class XmlParagraph implements WordParagraph {
    constructor(
        readonly element: Element,
        private readonly styles: StyleCatalogue,
    ) {}

    get runs(): WordRun[] {
        return getParagraphRuns(this.element).map((r) => new XmlRun(r));
    }

    get text(): string {
        return getParagraphText(this.element);
    }

    get styleId(): string | null {
        return getParagraphStyle(this.element);
    }

    get style(): StyleEntry | null {
        return this.styles.resolveParagraphStyle(this.styleId);
    }

    get styleName(): string {
        return this.styles.paragraphStyleName(this.styleId);
    }

    collapseToSingleRun(text: string): void {
        collapseParagraphRuns(this.element, text);
    }
}

class XmlTableCell implements WordTableCell {
    constructor(
        readonly element: Element,
        private readonly styles: StyleCatalogue,
    ) {}

    get paragraphs(): WordParagraph[] {
        return childElements(this.element, 'w:p').map((p) => new XmlParagraph(p, this.styles));
    }

    get text(): string {
        return this.paragraphs.map((p) => p.text).join('\n');
    }
}

class XmlTableRow implements WordTableRow {
    constructor(
        readonly element: Element,
        private readonly styles: StyleCatalogue,
    ) {}

    get cells(): WordTableCell[] {
        return childElements(this.element, 'w:tc').map((tc) => new XmlTableCell(tc, this.styles));
    }
}

class XmlTable implements WordTable {
    constructor(
        readonly element: Element,
        private readonly styles: StyleCatalogue,
    ) {}

    get rows(): WordTableRow[] {
        return childElements(this.element, 'w:tr').map((tr) => new XmlTableRow(tr, this.styles));
    }

    get columnCount(): number {
        const gridColumns = getGridColumnCount(this.element);
        if (gridColumns !== null) return gridColumns;

        // No w:tblGrid: the widest row decides.
        return childElements(this.element, 'w:tr').reduce((widest, tr) => {
            const width = childElements(tr, 'w:tc').reduce((sum, tc) => sum + getGridSpan(tc), getGridBefore(tr));
            return Math.max(widest, width);
        }, 0);
    }

    cell(rowIndex: number, columnIndex: number): WordTableCell {
        const rows = childElements(this.element, 'w:tr');
        const tr = rows[rowIndex];
        if (!tr || columnIndex < 0) {
            throw new DocxError(
                `cell (${rowIndex}, ${columnIndex}) is out of range`,
                DocxErrorCode.TABLE_CELL_OUT_OF_RANGE,
                { rowIndex, columnIndex },
            );
        }

        let gridStart = getGridBefore(tr);
        for (const tc of childElements(tr, 'w:tc')) {
            const span = getGridSpan(tc);
            if (columnIndex >= gridStart && columnIndex < gridStart + span) {
                return new XmlTableCell(tc, this.styles);
            }
            gridStart += span;
        }

        throw new DocxError(
            `cell (${rowIndex}, ${columnIndex}) is out of range`,
            DocxErrorCode.TABLE_CELL_OUT_OF_RANGE,
            { rowIndex, columnIndex },
        );
    }
}

export class DocxDocument implements WordDocument {
    readonly coreProperties: CoreProperties;
    readonly styles: StyleCatalogue;
    private readonly dom: Document;
    private readonly body: Element;

    private constructor(private readonly zip: PizZip) {
        this.dom = parseXml(getDocumentXml(zip), DOCX_PATHS.DOCUMENT_XML);
        this.body = getBody(this.dom);
        this.styles = StyleCatalogue.parse(readZipFileText(zip, DOCX_PATHS.STYLES_XML));
        this.coreProperties = parseCoreProperties(readZipFileText(zip, DOCX_PATHS.CORE_PROPERTIES));
    }

    /** Open a document from disk. Unreadable packages raise INVALID_DOCX. */
    static async open(filePath: string): Promise<DocxDocument> {
        return withErrorContext(
            async () => new DocxDocument(await loadDocxZip(filePath)),
            DocxErrorCode.INVALID_DOCX,
            { filePath },
        );
    }

    static fromZip(zip: PizZip): DocxDocument {
        return new DocxDocument(zip);
    }

    get paragraphs(): WordParagraph[] {
        return childElements(this.body, 'w:p').map((p) => new XmlParagraph(p, this.styles));
    }

    get tables(): WordTable[] {
        return childElements(this.body, 'w:tbl').map((tbl) => new XmlTable(tbl, this.styles));
    }

    get sectionCount(): number {
        return countSections(this.body);
    }

    allParagraphs(): WordParagraph[] {
        const out = [...this.paragraphs];
        for (const table of this.tables) {
            for (const row of table.rows) {
                for (const cell of row.cells) {
                    out.push(...cell.paragraphs);
                }
            }
        }
        return out;
    }

    insertParagraph(
        anchor: WordParagraph,
        text: string,
        styleId: string | null,
        position: InsertPosition,
    ): WordParagraph {
        const p = createParagraphElement(this.dom, text, styleId);
        insertSibling(anchor.element, p, position);
        return new XmlParagraph(p, this.styles);
    }

    /** Serialise the DOM back into the package and write it to `outputPath`. */
    async save(outputPath: string): Promise<void> {
        await saveDocxZip(this.zip, serializeXml(this.dom), outputPath);
    }
}

/** Load a fresh document model for one call. */
export async function openDocument(filePath: string): Promise<WordDocument> {
    return DocxDocument.open(filePath);
}
