/**
 * DOCX Error Handling
 *
 * Centralised error class, async error-wrapping utility and the result
 * channel every path-level operation reports through.
 *
 * @module docx/errors
 */

import { logger } from '../../utils/logger.js';

export class DocxError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DocxError';
    Error.captureStackTrace?.(this, DocxError);
  }

  toJSON(): Record<string, unknown> {
    return { name: this.name, message: this.message, code: this.code, context: this.context };
  }
}

export enum DocxErrorCode {
  DOCUMENT_NOT_FOUND = 'DOCUMENT_NOT_FOUND',
  INVALID_PATH = 'INVALID_PATH',
  INVALID_DOCX = 'INVALID_DOCX',
  STYLE_NOT_FOUND = 'STYLE_NOT_FOUND',
  TABLE_CELL_OUT_OF_RANGE = 'TABLE_CELL_OUT_OF_RANGE',
  DOCX_READ_FAILED = 'DOCX_READ_FAILED',
  DOCX_EDIT_FAILED = 'DOCX_EDIT_FAILED',
  XML_EXTRACT_FAILED = 'XML_EXTRACT_FAILED',
}

/** Wrap an async operation. Existing DocxErrors are re-thrown; anything else is wrapped. */
export async function withErrorContext<T>(
  operation: () => Promise<T>,
  errorCode: DocxErrorCode | string,
  context?: Record<string, unknown>
): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    if (error instanceof DocxError) throw error;
    const message = error instanceof Error ? error.message : String(error);
    throw new DocxError(message, errorCode, {
      ...context,
      originalError: error instanceof Error ? error.stack : String(error),
    });
  }
}

// ─── Result channel ──────────────────────────────────────────────────────────

export interface DocxSuccess<T> {
  ok: true;
  value: T;
}

export interface DocxFailure {
  ok: false;
  code: string;
  error: string;
}

export type DocxResult<T> = DocxSuccess<T> | DocxFailure;

export function isDocxError(error: unknown, code?: DocxErrorCode): error is DocxError {
  return error instanceof DocxError && (code === undefined || error.code === code);
}

/**
 * Human-readable failure text. A missing document is reported as-is,
 * anything else is prefixed with the failing operation.
 */
export function describeFailure(error: unknown, failurePrefix: string): string {
  if (isDocxError(error, DocxErrorCode.DOCUMENT_NOT_FOUND)) return error.message;
  const message = error instanceof Error ? error.message : String(error);
  return `${failurePrefix}: ${message}`;
}

/** Run an operation and convert any thrown error into a DocxFailure. */
export async function toDocxResult<T>(
  operation: () => Promise<T>,
  failurePrefix: string,
  errorCode: DocxErrorCode
): Promise<DocxResult<T>> {
  try {
    return { ok: true, value: await operation() };
  } catch (error) {
    const message = describeFailure(error, failurePrefix);
    logger.warn(message);
    return { ok: false, code: error instanceof DocxError ? error.code : errorCode, error: message };
  }
}
