/**
 * Op: find and replace text across formatted runs
 *
 * Text a user sees as one phrase is often split over several runs
 * ("f" + "oo bar"). Replacement happens in two passes:
 *
 * 1. run-local: every run whose own text contains the search text has its
 *    occurrences replaced in place, so run count and formatting survive;
 * 2. if the paragraph text still contains the search text, the remaining
 *    occurrences straddle run boundaries and the paragraph collapses to its
 *    first run holding the fully substituted text (formatting of the other
 *    runs is lost).
 *
 * Each replaced occurrence is counted once. Text written by a replacement
 * is never matched again, so the second pass only sees occurrences made of
 * characters that were already in the paragraph.
 */

import { normalizeLineBreaks } from '../dom.js';
import type { WordDocument, WordParagraph } from '../types.js';

/** Half-open range of paragraph text produced by a replacement. */
interface ReplacedSpan {
    start: number;
    end: number;
}

/** Start offsets of the leftmost non-overlapping occurrences of `search`. */
export function findOccurrences(text: string, search: string): number[] {
    const positions: number[] = [];
    if (!search) return positions;

    let from = text.indexOf(search);
    while (from !== -1) {
        positions.push(from);
        from = text.indexOf(search, from + search.length);
    }
    return positions;
}

/** Like findOccurrences, skipping any match that touches a replaced range. */
function findUnreplacedOccurrences(text: string, search: string, replaced: ReplacedSpan[]): number[] {
    const positions: number[] = [];
    let from = text.indexOf(search);
    while (from !== -1) {
        const end = from + search.length;
        if (replaced.some((r) => from < r.end && end > r.start)) {
            from = text.indexOf(search, from + 1);
        } else {
            positions.push(from);
            from = text.indexOf(search, end);
        }
    }
    return positions;
}

/** Replace `length` characters at each (ascending) offset with `replacement`. */
function spliceAt(text: string, offsets: number[], length: number, replacement: string): string {
    let out = '';
    let cursor = 0;
    for (const offset of offsets) {
        out += text.slice(cursor, offset) + replacement;
        cursor = offset + length;
    }
    return out + text.slice(cursor);
}

/** Replace every occurrence in one paragraph; returns the number replaced. */
export function replaceInParagraph(paragraph: WordParagraph, oldText: string, newText: string): number {
    if (!oldText || !paragraph.text.includes(oldText)) return 0;

    let count = 0;
    let offset = 0;
    const replaced: ReplacedSpan[] = [];
    const storedLength = normalizeLineBreaks(newText).length;

    for (const run of paragraph.runs) {
        const text = run.text;
        const local = findOccurrences(text, oldText);
        if (local.length > 0) {
            local.forEach((position, i) => {
                const start = offset + position + i * (storedLength - oldText.length);
                replaced.push({ start, end: start + storedLength });
            });
            run.text = spliceAt(text, local, oldText.length, newText);
            count += local.length;
        }
        offset += run.text.length;
    }

    const fullText = paragraph.text;
    const remaining = findUnreplacedOccurrences(fullText, oldText, replaced);
    if (remaining.length > 0) {
        paragraph.collapseToSingleRun(spliceAt(fullText, remaining, oldText.length, newText));
        count += remaining.length;
    }

    return count;
}

/**
 * Replace `oldText` with `newText` in every body paragraph, then in every
 * table-cell paragraph. Mutates the document in place; the caller saves.
 */
export function findAndReplaceText(doc: WordDocument, oldText: string, newText: string): number {
    if (!oldText) return 0;

    let count = 0;
    for (const paragraph of doc.allParagraphs()) {
        count += replaceInParagraph(paragraph, oldText, newText);
    }
    return count;
}
