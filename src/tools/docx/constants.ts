/**
 * DOCX constants shared across the module.
 */

// ═══════════════════════════════════════════════════════════════════════
// File paths
// ═══════════════════════════════════════════════════════════════════════

export const DOCX_PATHS = {
    DOCUMENT_XML: 'word/document.xml',
    STYLES_XML: 'word/styles.xml',
    CORE_PROPERTIES: 'docProps/core.xml',
} as const;

// ═══════════════════════════════════════════════════════════════════════
// XML namespaces
// ═══════════════════════════════════════════════════════════════════════

export const NAMESPACES = {
    CORE_PROPERTIES: 'http://schemas.openxmlformats.org/package/2006/metadata/core-properties',
    DUBLIN_CORE: 'http://purl.org/dc/elements/1.1/',
    DCTERMS: 'http://purl.org/dc/terms/',
} as const;

// ═══════════════════════════════════════════════════════════════════════
// Styles
// ═══════════════════════════════════════════════════════════════════════

/** Name reported for a paragraph whose style cannot be resolved. */
export const FALLBACK_STYLE_NAME = 'Normal';

/**
 * Built-in styles whose name is stored lower-case in styles.xml but shown
 * capitalised in the UI (internal name → UI name).
 */
export const BUILTIN_STYLE_UI_NAMES: Readonly<Record<string, string>> = {
    caption: 'Caption',
    footer: 'Footer',
    header: 'Header',
    'heading 1': 'Heading 1',
    'heading 2': 'Heading 2',
    'heading 3': 'Heading 3',
    'heading 4': 'Heading 4',
    'heading 5': 'Heading 5',
    'heading 6': 'Heading 6',
    'heading 7': 'Heading 7',
    'heading 8': 'Heading 8',
    'heading 9': 'Heading 9',
};

// ═══════════════════════════════════════════════════════════════════════
// Structure preview limits
// ═══════════════════════════════════════════════════════════════════════

export const PREVIEW_LIMITS = {
    PARAGRAPH_TEXT: 100,
    CELL_TEXT: 20,
    TABLE_ROWS: 3,
    TABLE_COLUMNS: 3,
} as const;

export const TRUNCATION_MARKER = '...';

/** Placeholder for a preview cell that does not exist in its row. */
export const MISSING_CELL_TEXT = 'N/A';
