/**
 * DOCX text operations: public API
 *
 * Re-exports only the symbols that external consumers need.
 * DOM helpers and the zip layer are consumed by sibling files and are
 * NOT part of the public surface.
 *
 * @module docx
 */

// ── Reading ─────────────────────────────────────────────────────────────────
export {
  getDocumentProperties,
  extractDocumentText,
  getDocumentStructure,
  getDocumentXml,
} from './read.js';

// ── Searching / Editing ─────────────────────────────────────────────────────
export { openDocument, DocxDocument } from './document.js';
export { findParagraphByText } from './search.js';
export { findAndReplaceText } from './ops/find-and-replace-text.js';
export { insertHeaderNearText, insertLineOrParagraphNearText } from './ops/insert-paragraph-near-text.js';
export { searchAndReplace, findParagraphs } from './edit.js';

// ── Types ───────────────────────────────────────────────────────────────────
export type {
  WordDocument,
  WordParagraph,
  WordRun,
  WordTable,
  InsertPosition,
  DocumentProperties,
  DocumentStructure,
  ParagraphMatch,
  ReplaceSummary,
  InsertResult,
} from './types.js';
export type { DocxResult } from './errors.js';

// ── Errors ──────────────────────────────────────────────────────────────────
export { DocxError, DocxErrorCode } from './errors.js';
