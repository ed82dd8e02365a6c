/**
 * Path-level search and edit: open a document, run an operation on the
 * model, save when something changed.
 *
 * @module docx/edit
 */

import { openDocument } from './document.js';
import { DocxErrorCode, toDocxResult, type DocxResult } from './errors.js';
import { findAndReplaceText } from './ops/find-and-replace-text.js';
import { findParagraphByText } from './search.js';
import type { ParagraphMatch, ReplaceSummary } from './types.js';
import { assertDocumentExists } from './validators.js';

/** Replace every occurrence of `findText`, saving back to `docPath` only when one was found. */
export async function searchAndReplace(
  docPath: string,
  findText: string,
  replaceText: string
): Promise<DocxResult<ReplaceSummary>> {
  return toDocxResult(
    async () => {
      await assertDocumentExists(docPath);
      const doc = await openDocument(docPath);

      const count = findAndReplaceText(doc, findText, replaceText);
      if (count === 0) {
        return { count, message: `No occurrences of '${findText}' found.` };
      }

      await doc.save(docPath);
      return { count, message: `Replaced ${count} occurrence(s) of '${findText}' with '${replaceText}'.` };
    },
    'Failed to search and replace',
    DocxErrorCode.DOCX_EDIT_FAILED
  );
}

/** Body paragraphs matching `text`, with their index and full text. */
export async function findParagraphs(
  docPath: string,
  text: string,
  partialMatch = false
): Promise<DocxResult<ParagraphMatch[]>> {
  return toDocxResult(
    async () => {
      await assertDocumentExists(docPath);
      const doc = await openDocument(docPath);
      const paragraphs = doc.paragraphs;

      return findParagraphByText(doc, text, partialMatch).map((index) => ({
        index,
        text: paragraphs[index]?.text ?? '',
      }));
    },
    'Failed to search document',
    DocxErrorCode.DOCX_READ_FAILED
  );
}
