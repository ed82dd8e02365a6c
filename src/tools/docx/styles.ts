/**
 * Style catalogue read from word/styles.xml.
 *
 * Paragraphs reference styles by id (w:pStyle/@w:val); users talk about
 * them by name ("Heading 1"). This module maps between the two and knows
 * which paragraph style is the document default.
 *
 * @module docx/styles
 */

import { BUILTIN_STYLE_UI_NAMES, FALLBACK_STYLE_NAME } from './constants.js';
import { childElements, findDirectChild, parseXml } from './dom.js';
import { DocxError, DocxErrorCode } from './errors.js';

export interface StyleEntry {
    styleId: string;
    /** Name as shown to users (built-in lower-case names capitalised). */
    name: string;
    type: string;
    isDefault: boolean;
}

function toUiName(internalName: string): string {
    return BUILTIN_STYLE_UI_NAMES[internalName] ?? internalName;
}

function isTruthyOnOff(value: string | null): boolean {
    return value === '1' || value === 'true' || value === 'on';
}

export class StyleCatalogue {
    private readonly byId = new Map<string, StyleEntry>();

    constructor(readonly entries: readonly StyleEntry[]) {
        for (const entry of entries) {
            if (!this.byId.has(entry.styleId)) this.byId.set(entry.styleId, entry);
        }
    }

    /** Build a catalogue from styles.xml; a missing part yields an empty one. */
    static parse(stylesXml: string | null): StyleCatalogue {
        if (!stylesXml) return new StyleCatalogue([]);

        const dom = parseXml(stylesXml, 'word/styles.xml');
        const entries: StyleEntry[] = [];
        for (const style of childElements(dom.documentElement, 'w:style')) {
            const styleId = style.getAttribute('w:styleId');
            if (!styleId) continue;

            const nameEl = findDirectChild(style, 'w:name');
            const internalName = nameEl?.getAttribute('w:val') || styleId;
            entries.push({
                styleId,
                name: toUiName(internalName),
                type: style.getAttribute('w:type') || 'paragraph',
                isDefault: isTruthyOnOff(style.getAttribute('w:default')),
            });
        }
        return new StyleCatalogue(entries);
    }

    get isEmpty(): boolean {
        return this.entries.length === 0;
    }

    get defaultParagraphStyle(): StyleEntry | null {
        return this.entries.find((s) => s.type === 'paragraph' && s.isDefault) ?? null;
    }

    /**
     * Effective paragraph style for a w:pStyle id. An absent or unknown id
     * resolves to the default paragraph style.
     */
    resolveParagraphStyle(styleId: string | null): StyleEntry | null {
        if (styleId) {
            const entry = this.byId.get(styleId);
            if (entry && entry.type === 'paragraph') return entry;
        }
        return this.defaultParagraphStyle;
    }

    /** Display name of a paragraph's effective style. */
    paragraphStyleName(styleId: string | null): string {
        return this.resolveParagraphStyle(styleId)?.name ?? FALLBACK_STYLE_NAME;
    }

    /** Look up a paragraph style by UI name, then case-insensitively, then by id. */
    findParagraphStyle(nameOrId: string): StyleEntry | null {
        const paragraphStyles = this.entries.filter((s) => s.type === 'paragraph');
        const lowered = nameOrId.toLowerCase();
        return (
            paragraphStyles.find((s) => s.name === nameOrId) ??
            paragraphStyles.find((s) => s.name.toLowerCase() === lowered) ??
            paragraphStyles.find((s) => s.styleId === nameOrId) ??
            null
        );
    }

    /**
     * The w:pStyle value to write for a style name, or null when the name
     * is the default paragraph style (which is expressed by omitting
     * w:pStyle). Documents without a style catalogue get an id derived
     * from the name.
     */
    styleIdForName(name: string): string | null {
        const entry = this.findParagraphStyle(name);
        if (entry) return entry.isDefault ? null : entry.styleId;

        if (this.isEmpty) return name.replace(/\s+/g, '');

        throw new DocxError(`no style with name '${name}'`, DocxErrorCode.STYLE_NOT_FOUND, { name });
    }
}
