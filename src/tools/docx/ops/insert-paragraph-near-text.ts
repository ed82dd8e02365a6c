/**
 * Op: insert a new paragraph before or after the first body paragraph that
 * contains an anchor text.
 *
 * Both public functions open the document, mutate, and save back to the
 * same path. Nothing is written when the anchor is missing or the style
 * cannot be resolved.
 */

import { DEFAULT_HEADER_STYLE } from '../../../config.js';
import { logger } from '../../../utils/logger.js';
import { openDocument } from '../document.js';
import { describeFailure } from '../errors.js';
import type { InsertPosition, InsertResult, WordDocument, WordParagraph } from '../types.js';
import { assertDocumentExists } from '../validators.js';

interface ResolvedStyle {
    /** Value for w:pStyle, null for the default paragraph style. */
    styleId: string | null;
    name: string;
}

interface InsertRequest {
    docPath: string;
    targetText: string;
    text: string;
    position: InsertPosition;
    resolveStyle: (doc: WordDocument, anchor: WordParagraph) => ResolvedStyle;
    describe: (style: ResolvedStyle) => string;
    failurePrefix: string;
}

function findAnchor(doc: WordDocument, targetText: string): WordParagraph | undefined {
    return doc.paragraphs.find((p) => p.text.includes(targetText));
}

/** The style a paragraph would pass on to a sibling inserted beside it. */
function inheritStyle(anchor: WordParagraph): ResolvedStyle {
    const style = anchor.style;
    if (style) {
        return { styleId: style.isDefault ? null : style.styleId, name: style.name };
    }
    return { styleId: anchor.styleId, name: anchor.styleName };
}

async function insertNearText(request: InsertRequest): Promise<InsertResult> {
    const { docPath, targetText, text, position } = request;
    try {
        await assertDocumentExists(docPath);
        const doc = await openDocument(docPath);

        const anchor = findAnchor(doc, targetText);
        if (!anchor) {
            return { status: 'not_found', message: `Target text '${targetText}' not found in document.` };
        }

        const style = request.resolveStyle(doc, anchor);
        doc.insertParagraph(anchor, text, style.styleId, position);
        await doc.save(docPath);

        const message = request.describe(style);
        logger.debug(message);
        return { status: 'inserted', message };
    } catch (error) {
        const message = describeFailure(error, request.failurePrefix);
        logger.warn(message);
        return { status: 'failed', message };
    }
}

/** Insert a heading-styled paragraph next to the paragraph containing `targetText`. */
export async function insertHeaderNearText(
    docPath: string,
    targetText: string,
    headerTitle: string,
    position: InsertPosition = 'after',
    headerStyle: string = DEFAULT_HEADER_STYLE,
): Promise<InsertResult> {
    return insertNearText({
        docPath,
        targetText,
        text: headerTitle,
        position,
        resolveStyle: (doc) => ({ styleId: doc.styles.styleIdForName(headerStyle), name: headerStyle }),
        describe: () =>
            `Header '${headerTitle}' (style: ${headerStyle}) inserted ${position} paragraph containing '${targetText}'.`,
        failurePrefix: 'Failed to insert header',
    });
}

/**
 * Insert a plain paragraph next to the paragraph containing `targetText`.
 * Without `lineStyle` the new paragraph takes the anchor's style.
 */
export async function insertLineOrParagraphNearText(
    docPath: string,
    targetText: string,
    lineText: string,
    position: InsertPosition = 'after',
    lineStyle?: string,
): Promise<InsertResult> {
    return insertNearText({
        docPath,
        targetText,
        text: lineText,
        position,
        resolveStyle: (doc, anchor) =>
            lineStyle ? { styleId: doc.styles.styleIdForName(lineStyle), name: lineStyle } : inheritStyle(anchor),
        describe: (style) =>
            `Line/paragraph inserted ${position} paragraph containing '${targetText}' with style '${style.name}'.`,
        failurePrefix: 'Failed to insert line/paragraph',
    });
}
