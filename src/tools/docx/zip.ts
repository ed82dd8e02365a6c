/**
 * DOCX ZIP I/O: file ↔ zip ↔ xml.
 *
 * The document model depends on these functions for disk I/O;
 * it never touches the file system directly.
 */

import fs from 'fs/promises';
import PizZip from 'pizzip';
import { DOCX_PATHS } from './constants.js';
import { DocxError, DocxErrorCode } from './errors.js';

/**
 * Read a .docx file from disk and return a PizZip instance.
 */
export async function loadDocxZip(filePath: string): Promise<PizZip> {
    const buf = await fs.readFile(filePath);
    return new PizZip(buf);
}

/** Text of a zip entry, or null when the entry is missing. */
export function readZipFileText(zip: PizZip, entryName: string): string | null {
    const entry = zip.file(entryName);
    return entry ? entry.asText() : null;
}

/**
 * Extract the raw XML string from word/document.xml inside the zip.
 * Throws if the entry is missing.
 */
export function getDocumentXml(zip: PizZip): string {
    const xml = readZipFileText(zip, DOCX_PATHS.DOCUMENT_XML);
    if (xml === null) {
        throw new DocxError('Invalid DOCX: missing word/document.xml', DocxErrorCode.INVALID_DOCX);
    }
    return xml;
}

/**
 * Replace word/document.xml in the zip with new XML,
 * then write the whole archive to outputPath.
 */
export async function saveDocxZip(
    zip: PizZip,
    newDocumentXml: string,
    outputPath: string,
): Promise<void> {
    zip.file(DOCX_PATHS.DOCUMENT_XML, newDocumentXml);
    const buf = zip.generate({ type: 'nodebuffer', compression: 'DEFLATE' });
    await fs.writeFile(outputPath, buf);
}
