/**
 * ZIP File Reader
 * Raw entry access for DOCX packages, without building a document model.
 */

import fs from 'fs/promises';
import JSZip from 'jszip';
import { DocxError, DocxErrorCode } from '../errors.js';

/**
 * Read one entry of the package at `filePath` as UTF-8 text.
 * Throws if the archive has no such entry.
 */
export async function readPackageEntryText(filePath: string, entryName: string): Promise<string> {
  const buffer = await fs.readFile(filePath);
  const zip = await JSZip.loadAsync(buffer);
  const entry = zip.file(entryName);
  if (!entry) {
    throw new DocxError(`There is no item named '${entryName}' in the archive`, DocxErrorCode.INVALID_DOCX, {
      filePath,
      entryName,
    });
  }
  return entry.async('string');
}

