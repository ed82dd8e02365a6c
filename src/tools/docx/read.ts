/**
 * DOCX reading utilities
 * Extracts metadata, text, a structural preview and the raw body markup.
 *
 * Every function opens its own document model and reports failures through
 * DocxResult instead of throwing.
 */

import { DOCX_PATHS, MISSING_CELL_TEXT, PREVIEW_LIMITS, TRUNCATION_MARKER } from './constants.js';
import { openDocument } from './document.js';
import { DocxErrorCode, isDocxError, toDocxResult, type DocxResult } from './errors.js';
import { readPackageEntryText } from './parsers/zip-reader.js';
import type {
    DocumentProperties,
    DocumentStructure,
    ParagraphPreview,
    TablePreview,
    WordDocument,
    WordTable,
} from './types.js';
import { assertDocumentExists } from './validators.js';

// ═══════════════════════════════════════════════════════════════════════
// Internal helpers
// ═══════════════════════════════════════════════════════════════════════

/** Number of whitespace-separated tokens. */
export function countWords(text: string): number {
    return text.split(/\s+/).filter((w) => w.length > 0).length;
}

/** Cut `text` to `max` characters, appending "..." when anything was cut. */
export function truncateText(text: string, max: number): string {
    const chars = Array.from(text);
    if (chars.length <= max) return text;
    return chars.slice(0, max).join('') + TRUNCATION_MARKER;
}

async function loadExisting(docPath: string): Promise<WordDocument> {
    await assertDocumentExists(docPath);
    return openDocument(docPath);
}

function previewTable(table: WordTable, index: number): TablePreview {
    const rowCount = table.rows.length;
    const columnCount = table.columnCount;
    const preview: string[][] = [];

    for (let r = 0; r < Math.min(PREVIEW_LIMITS.TABLE_ROWS, rowCount); r++) {
        const rowData: string[] = [];
        for (let c = 0; c < Math.min(PREVIEW_LIMITS.TABLE_COLUMNS, columnCount); c++) {
            try {
                rowData.push(truncateText(table.cell(r, c).text, PREVIEW_LIMITS.CELL_TEXT));
            } catch (error) {
                if (!isDocxError(error, DocxErrorCode.TABLE_CELL_OUT_OF_RANGE)) throw error;
                rowData.push(MISSING_CELL_TEXT);
            }
        }
        preview.push(rowData);
    }

    return { index, rows: rowCount, columns: columnCount, preview };
}

// ═══════════════════════════════════════════════════════════════════════
// Public read functions
// ═══════════════════════════════════════════════════════════════════════

/** Core metadata plus page, word, paragraph and table counts. */
export async function getDocumentProperties(docPath: string): Promise<DocxResult<DocumentProperties>> {
    return toDocxResult(
        async () => {
            const doc = await loadExisting(docPath);
            const core = doc.coreProperties;
            const paragraphs = doc.paragraphs;

            return {
                title: core.title,
                author: core.author,
                subject: core.subject,
                keywords: core.keywords,
                created: core.created ? core.created.toISOString() : '',
                modified: core.modified ? core.modified.toISOString() : '',
                lastModifiedBy: core.lastModifiedBy,
                revision: core.revision,
                pageCount: doc.sectionCount,
                wordCount: paragraphs.reduce((sum, p) => sum + countWords(p.text), 0),
                paragraphCount: paragraphs.length,
                tableCount: doc.tables.length,
            };
        },
        'Failed to get document properties',
        DocxErrorCode.DOCX_READ_FAILED,
    );
}

/**
 * All text, one paragraph per line: body paragraphs first, then the
 * paragraphs of every table cell (tables, rows and cells in order).
 */
export async function extractDocumentText(docPath: string): Promise<DocxResult<string>> {
    return toDocxResult(
        async () => {
            const doc = await loadExisting(docPath);
            return doc.allParagraphs().map((p) => p.text).join('\n');
        },
        'Failed to extract text',
        DocxErrorCode.DOCX_READ_FAILED,
    );
}

/** Paragraph previews with resolved style names and 3×3 table previews. */
export async function getDocumentStructure(docPath: string): Promise<DocxResult<DocumentStructure>> {
    return toDocxResult(
        async () => {
            const doc = await loadExisting(docPath);

            const paragraphs: ParagraphPreview[] = doc.paragraphs.map((p, index) => ({
                index,
                text: truncateText(p.text, PREVIEW_LIMITS.PARAGRAPH_TEXT),
                style: p.styleName,
            }));
            const tables = doc.tables.map((table, index) => previewTable(table, index));

            return { paragraphs, tables };
        },
        'Failed to get document structure',
        DocxErrorCode.DOCX_READ_FAILED,
    );
}

/** Raw word/document.xml, decoded as UTF-8 and not parsed. */
export async function getDocumentXml(docPath: string): Promise<DocxResult<string>> {
    return toDocxResult(
        async () => {
            await assertDocumentExists(docPath);
            return readPackageEntryText(docPath, DOCX_PATHS.DOCUMENT_XML);
        },
        'Failed to extract XML',
        DocxErrorCode.XML_EXTRACT_FAILED,
    );
}
