/**
 * DOCX Metadata Extractor
 *
 * Extracts document metadata (title, author, dates, etc.) from the core
 * properties part (docProps/core.xml).
 *
 * @module docx/extractors/metadata
 */

import type { CoreProperties } from '../types.js';
import { NAMESPACES } from '../constants.js';
import { parseXml } from '../dom.js';

export function emptyCoreProperties(): CoreProperties {
  return {
    title: '',
    author: '',
    subject: '',
    keywords: '',
    lastModifiedBy: '',
    created: null,
    modified: null,
    revision: 0,
  };
}

/**
 * Parse core properties. A document without the part gets empty values.
 */
export function parseCoreProperties(corePropsXml: string | null): CoreProperties {
  const metadata = emptyCoreProperties();
  if (!corePropsXml) return metadata;

  const doc = parseXml(corePropsXml, 'docProps/core.xml');

  /** Extract text content from a namespaced tag. */
  const getText = (ns: string, tag: string): string => {
    const el = doc.getElementsByTagNameNS(ns, tag).item(0);
    return el?.textContent?.trim() ?? '';
  };

  /** Extract a W3CDTF date; unparseable values count as absent. */
  const getDate = (tag: string): Date | null => {
    const dateStr = getText(NAMESPACES.DCTERMS, tag);
    if (!dateStr) return null;
    const d = new Date(dateStr);
    return Number.isNaN(d.getTime()) ? null : d;
  };

  const revision = Number.parseInt(getText(NAMESPACES.CORE_PROPERTIES, 'revision'), 10);

  metadata.title = getText(NAMESPACES.DUBLIN_CORE, 'title');
  metadata.author = getText(NAMESPACES.DUBLIN_CORE, 'creator');
  metadata.subject = getText(NAMESPACES.DUBLIN_CORE, 'subject');
  metadata.keywords = getText(NAMESPACES.CORE_PROPERTIES, 'keywords');
  metadata.lastModifiedBy = getText(NAMESPACES.CORE_PROPERTIES, 'lastModifiedBy');
  metadata.created = getDate('created');
  metadata.modified = getDate('modified');
  metadata.revision = Number.isInteger(revision) && revision >= 0 ? revision : 0;

  return metadata;
}
