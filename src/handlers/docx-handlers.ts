import { z } from 'zod';

import { getConfig } from '../config.js';
import { createErrorResponse, createTextResponse } from '../error-handlers.js';
import {
    extractDocumentText,
    findParagraphs,
    getDocumentProperties,
    getDocumentStructure,
    getDocumentXml,
    insertHeaderNearText,
    insertLineOrParagraphNearText,
    searchAndReplace,
    type DocxResult,
    type InsertResult,
} from '../tools/docx/index.js';
import {
    FindTextInDocumentArgsSchema,
    GetDocumentInfoArgsSchema,
    GetDocumentOutlineArgsSchema,
    GetDocumentTextArgsSchema,
    GetDocumentXmlArgsSchema,
    InsertHeaderNearTextArgsSchema,
    InsertLineOrParagraphNearTextArgsSchema,
    SearchAndReplaceArgsSchema,
} from '../tools/schemas.js';
import { ServerResult } from '../types.js';

type ParsedArgs<T> = { ok: true; args: T } | { ok: false; response: ServerResult };

/**
 * Validate tool arguments; a schema violation becomes an error response
 * naming every offending field.
 */
function parseArgs<S extends z.ZodTypeAny>(schema: S, args: unknown, toolName: string): ParsedArgs<z.output<S>> {
    if (args === null || args === undefined) {
        return { ok: false, response: createErrorResponse(`No arguments provided for ${toolName} command`) };
    }
    const parsed = schema.safeParse(args);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map((issue) => `${issue.path.join('.') || 'arguments'}: ${issue.message}`)
            .join('; ');
        return { ok: false, response: createErrorResponse(`Invalid arguments for ${toolName}: ${issues}`) };
    }
    return { ok: true, args: parsed.data };
}

function fromResult<T>(result: DocxResult<T>, format: (value: T) => string): ServerResult {
    return result.ok ? createTextResponse(format(result.value)) : createErrorResponse(result.error);
}

function fromInsertResult(result: InsertResult): ServerResult {
    return result.status === 'inserted' ? createTextResponse(result.message) : createErrorResponse(result.message);
}

const toJson = (value: unknown): string => JSON.stringify(value, null, 2);

/**
 * Handle get_document_info command
 */
export async function handleGetDocumentInfo(args: unknown): Promise<ServerResult> {
    const parsed = parseArgs(GetDocumentInfoArgsSchema, args, 'get_document_info');
    if (!parsed.ok) return parsed.response;
    return fromResult(await getDocumentProperties(parsed.args.path), toJson);
}

/**
 * Handle get_document_text command
 */
export async function handleGetDocumentText(args: unknown): Promise<ServerResult> {
    const parsed = parseArgs(GetDocumentTextArgsSchema, args, 'get_document_text');
    if (!parsed.ok) return parsed.response;
    return fromResult(await extractDocumentText(parsed.args.path), (text) => text);
}

/**
 * Handle get_document_outline command
 */
export async function handleGetDocumentOutline(args: unknown): Promise<ServerResult> {
    const parsed = parseArgs(GetDocumentOutlineArgsSchema, args, 'get_document_outline');
    if (!parsed.ok) return parsed.response;
    return fromResult(await getDocumentStructure(parsed.args.path), toJson);
}

/**
 * Handle get_document_xml command
 */
export async function handleGetDocumentXml(args: unknown): Promise<ServerResult> {
    const parsed = parseArgs(GetDocumentXmlArgsSchema, args, 'get_document_xml');
    if (!parsed.ok) return parsed.response;
    return fromResult(await getDocumentXml(parsed.args.path), (xml) => xml);
}

/**
 * Handle find_text_in_document command
 */
export async function handleFindTextInDocument(args: unknown): Promise<ServerResult> {
    const parsed = parseArgs(FindTextInDocumentArgsSchema, args, 'find_text_in_document');
    if (!parsed.ok) return parsed.response;
    const { path, text, partial_match } = parsed.args;

    return fromResult(await findParagraphs(path, text, partial_match), (matches) =>
        matches.length === 0
            ? `No paragraphs matching '${text}' found.`
            : toJson({ matches, total: matches.length }),
    );
}

/**
 * Handle search_and_replace command
 */
export async function handleSearchAndReplace(args: unknown): Promise<ServerResult> {
    const parsed = parseArgs(SearchAndReplaceArgsSchema, args, 'search_and_replace');
    if (!parsed.ok) return parsed.response;
    const { path, find_text, replace_text } = parsed.args;

    return fromResult(await searchAndReplace(path, find_text, replace_text), (summary) => summary.message);
}

/**
 * Handle insert_header_near_text command
 */
export async function handleInsertHeaderNearText(args: unknown): Promise<ServerResult> {
    const parsed = parseArgs(InsertHeaderNearTextArgsSchema, args, 'insert_header_near_text');
    if (!parsed.ok) return parsed.response;
    const { path, target_text, header_title, position, header_style } = parsed.args;

    const style = header_style ?? getConfig().defaultHeaderStyle;
    return fromInsertResult(await insertHeaderNearText(path, target_text, header_title, position, style));
}

/**
 * Handle insert_line_or_paragraph_near_text command
 */
export async function handleInsertLineOrParagraphNearText(args: unknown): Promise<ServerResult> {
    const parsed = parseArgs(InsertLineOrParagraphNearTextArgsSchema, args, 'insert_line_or_paragraph_near_text');
    if (!parsed.ok) return parsed.response;
    const { path, target_text, line_text, position, line_style } = parsed.args;

    return fromInsertResult(await insertLineOrParagraphNearText(path, target_text, line_text, position, line_style));
}
