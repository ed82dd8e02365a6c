/**
 * Paragraph search over the document body.
 */

import type { WordDocument } from './types.js';

/**
 * Indices of body paragraphs whose text contains `text` (partialMatch)
 * or equals it exactly. No match yields an empty list.
 */
export function findParagraphByText(doc: WordDocument, text: string, partialMatch = false): number[] {
    const matches: number[] = [];

    doc.paragraphs.forEach((paragraph, index) => {
        const paragraphText = paragraph.text;
        if (partialMatch ? paragraphText.includes(text) : paragraphText === text) {
            matches.push(index);
        }
    });

    return matches;
}
