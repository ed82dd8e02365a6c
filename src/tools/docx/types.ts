/**
 * Type definitions for DOCX operations.
 * Single source of truth for every type used across the DOCX module.
 */

import type { StyleCatalogue, StyleEntry } from './styles.js';

// ═══════════════════════════════════════════════════════════════════════
// Document model
// ═══════════════════════════════════════════════════════════════════════

/** A styled text span. Reading and writing `text` keeps its formatting. */
export interface WordRun {
    readonly element: Element;
    text: string;
}

export interface WordParagraph {
    readonly element: Element;
    /** Runs in document order; `text` is always their concatenation. */
    readonly runs: WordRun[];
    readonly text: string;
    /** Raw w:pStyle id, null when the paragraph names no style. */
    readonly styleId: string | null;
    /** Effective style from the catalogue, null when nothing resolves. */
    readonly style: StyleEntry | null;
    /** Display name of the effective style ("Normal" when unresolved). */
    readonly styleName: string;
    /**
     * Collapse to one run holding `text`. The first run keeps its
     * formatting; every other run is removed.
     */
    collapseToSingleRun(text: string): void;
}

export interface WordTableCell {
    readonly element: Element;
    readonly paragraphs: WordParagraph[];
    /** Paragraph texts joined with "\n". */
    readonly text: string;
}

export interface WordTableRow {
    readonly element: Element;
    readonly cells: WordTableCell[];
}

export interface WordTable {
    readonly element: Element;
    readonly rows: WordTableRow[];
    readonly columnCount: number;
    /** Cell at a grid position; throws when the row has no cell there. */
    cell(rowIndex: number, columnIndex: number): WordTableCell;
}

export type InsertPosition = 'before' | 'after';

export interface WordDocument {
    /** Body paragraphs (direct children of w:body). */
    readonly paragraphs: WordParagraph[];
    /** Body tables (direct children of w:body). */
    readonly tables: WordTable[];
    readonly sectionCount: number;
    readonly coreProperties: CoreProperties;
    readonly styles: StyleCatalogue;
    /** Body paragraphs followed by every table-cell paragraph. */
    allParagraphs(): WordParagraph[];
    /** Insert a new single-run paragraph next to `anchor`. */
    insertParagraph(
        anchor: WordParagraph,
        text: string,
        styleId: string | null,
        position: InsertPosition,
    ): WordParagraph;
    save(outputPath: string): Promise<void>;
}

// ═══════════════════════════════════════════════════════════════════════
// Metadata
// ═══════════════════════════════════════════════════════════════════════

export interface CoreProperties {
    title: string;
    author: string;
    subject: string;
    keywords: string;
    lastModifiedBy: string;
    created: Date | null;
    modified: Date | null;
    revision: number;
}

export interface DocumentProperties {
    title: string;
    author: string;
    subject: string;
    keywords: string;
    /** ISO-8601, empty when absent. */
    created: string;
    /** ISO-8601, empty when absent. */
    modified: string;
    lastModifiedBy: string;
    revision: number;
    pageCount: number;
    wordCount: number;
    paragraphCount: number;
    tableCount: number;
}

// ═══════════════════════════════════════════════════════════════════════
// Structure preview
// ═══════════════════════════════════════════════════════════════════════

export interface ParagraphPreview {
    index: number;
    text: string;
    style: string;
}

export interface TablePreview {
    index: number;
    rows: number;
    columns: number;
    preview: string[][];
}

export interface DocumentStructure {
    paragraphs: ParagraphPreview[];
    tables: TablePreview[];
}

// ═══════════════════════════════════════════════════════════════════════
// Search / edit results
// ═══════════════════════════════════════════════════════════════════════

export interface ParagraphMatch {
    index: number;
    text: string;
}

export interface ReplaceSummary {
    count: number;
    message: string;
}

export interface InsertResult {
    status: 'inserted' | 'not_found' | 'failed';
    message: string;
}
