/**
 * DOCX Validation Utilities
 *
 * Input validation for document paths.
 *
 * @module docx/validators
 */

import fs from 'fs/promises';
import { DocxError, DocxErrorCode } from './errors.js';

/** Validate that a document path is a non-empty string. */
export function validateDocxPath(path: string): void {
  if (!path || typeof path !== 'string' || !path.trim()) {
    throw new DocxError('DOCX path must be a non-empty string', DocxErrorCode.INVALID_PATH, { path });
  }
}

export async function documentExists(path: string): Promise<boolean> {
  try {
    await fs.access(path);
    return true;
  } catch {
    return false;
  }
}

/** Throw DOCUMENT_NOT_FOUND unless `path` names an existing file. */
export async function assertDocumentExists(path: string): Promise<void> {
  validateDocxPath(path);
  if (!(await documentExists(path))) {
    throw new DocxError(`Document ${path} does not exist`, DocxErrorCode.DOCUMENT_NOT_FOUND, { path });
  }
}
