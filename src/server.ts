import {Server} from "@modelcontextprotocol/sdk/server/index.js";
import {
    CallToolRequestSchema,
    ListToolsRequestSchema,
    ListResourcesRequestSchema,
    ListPromptsRequestSchema,
    type CallToolRequest,
    type Tool,
} from "@modelcontextprotocol/sdk/types.js";
import type {ZodTypeAny} from "zod";
import {zodToJsonSchema} from "zod-to-json-schema";

import {
    GetDocumentInfoArgsSchema,
    GetDocumentTextArgsSchema,
    GetDocumentOutlineArgsSchema,
    GetDocumentXmlArgsSchema,
    FindTextInDocumentArgsSchema,
    SearchAndReplaceArgsSchema,
    InsertHeaderNearTextArgsSchema,
    InsertLineOrParagraphNearTextArgsSchema,
} from './tools/schemas.js';
import * as handlers from './handlers/index.js';
import {ServerResult, ToolHandler} from './types.js';
import {createErrorResponse} from './error-handlers.js';
import {VERSION} from './version.js';
import {logToStderr, logger} from './utils/logger.js';

const PATH_GUIDANCE = `Use an absolute path to an existing .docx file.`;

type JsonInputSchema = Tool['inputSchema'];

function toInputSchema(schema: ZodTypeAny): JsonInputSchema {
    const {$schema: _draft, ...jsonSchema} = zodToJsonSchema(schema);
    return {...jsonSchema, type: "object"};
}

// Tool list, in the order clients display it
export const TOOLS: Tool[] = [
    // Reading tools
    {
        name: "get_document_info",
        description: `
            Get document metadata and statistics: title, author, subject, keywords,
            created/modified timestamps (ISO-8601), last modified by, revision,
            page (section) count, word count, paragraph count and table count.
            ${PATH_GUIDANCE}`,
        inputSchema: toInputSchema(GetDocumentInfoArgsSchema),
        annotations: {
            title: "Get Document Info",
            readOnlyHint: true,
        },
    },
    {
        name: "get_document_text",
        description: `
            Extract all text, one paragraph per line. Body paragraphs come first,
            followed by the paragraphs of every table cell in document order.
            ${PATH_GUIDANCE}`,
        inputSchema: toInputSchema(GetDocumentTextArgsSchema),
        annotations: {
            title: "Get Document Text",
            readOnlyHint: true,
        },
    },
    {
        name: "get_document_outline",
        description: `
            Get a structural preview: every body paragraph with its style name
            (text cut to 100 characters) and, for each table, its size plus the
            first 3 rows x 3 columns (cell text cut to 20 characters).
            ${PATH_GUIDANCE}`,
        inputSchema: toInputSchema(GetDocumentOutlineArgsSchema),
        annotations: {
            title: "Get Document Outline",
            readOnlyHint: true,
        },
    },
    {
        name: "get_document_xml",
        description: `
            Return the raw WordprocessingML of word/document.xml, unparsed.
            Useful for inspecting formatting the other tools do not expose.
            ${PATH_GUIDANCE}`,
        inputSchema: toInputSchema(GetDocumentXmlArgsSchema),
        annotations: {
            title: "Get Document XML",
            readOnlyHint: true,
        },
    },
    {
        name: "find_text_in_document",
        description: `
            Find body paragraphs containing the given text (partial_match, default)
            or equal to it. Returns each match's paragraph index and full text.
            ${PATH_GUIDANCE}`,
        inputSchema: toInputSchema(FindTextInDocumentArgsSchema),
        annotations: {
            title: "Find Text In Document",
            readOnlyHint: true,
        },
    },
    {
        name: "search_and_replace",
        description: `
            Replace every occurrence of find_text with replace_text in body and
            table paragraphs, including text split across formatting runs.
            Formatting is kept when an occurrence lies inside one run; a paragraph
            with an occurrence spanning runs is rewritten as a single run.
            The document is saved in place only when something was replaced.
            ${PATH_GUIDANCE}`,
        inputSchema: toInputSchema(SearchAndReplaceArgsSchema),
        annotations: {
            title: "Search And Replace",
            readOnlyHint: false,
            destructiveHint: true,
        },
    },
    {
        name: "insert_header_near_text",
        description: `
            Insert a heading paragraph before or after the first body paragraph
            containing target_text. header_style names a paragraph style
            (default from config, "Heading 1" unless configured).
            The document is saved in place.
            ${PATH_GUIDANCE}`,
        inputSchema: toInputSchema(InsertHeaderNearTextArgsSchema),
        annotations: {
            title: "Insert Header Near Text",
            readOnlyHint: false,
        },
    },
    {
        name: "insert_line_or_paragraph_near_text",
        description: `
            Insert a plain paragraph before or after the first body paragraph
            containing target_text. Without line_style the new paragraph takes the
            style of the paragraph it is inserted next to.
            The document is saved in place.
            ${PATH_GUIDANCE}`,
        inputSchema: toInputSchema(InsertLineOrParagraphNearTextArgsSchema),
        annotations: {
            title: "Insert Line Or Paragraph Near Text",
            readOnlyHint: false,
        },
    },
];

const TOOL_HANDLERS: Record<string, ToolHandler> = {
    get_document_info: handlers.handleGetDocumentInfo,
    get_document_text: handlers.handleGetDocumentText,
    get_document_outline: handlers.handleGetDocumentOutline,
    get_document_xml: handlers.handleGetDocumentXml,
    find_text_in_document: handlers.handleFindTextInDocument,
    search_and_replace: handlers.handleSearchAndReplace,
    insert_header_near_text: handlers.handleInsertHeaderNearText,
    insert_line_or_paragraph_near_text: handlers.handleInsertLineOrParagraphNearText,
};

export function createServer(): Server {
    const server = new Server(
        {
            name: "docx-text-tools",
            version: VERSION,
        },
        {
            capabilities: {
                tools: {},
                resources: {},  // Empty resources capability
                prompts: {},    // Empty prompts capability
            },
        },
    );

    server.setRequestHandler(ListResourcesRequestSchema, async () => ({
        resources: [],
    }));

    server.setRequestHandler(ListPromptsRequestSchema, async () => ({
        prompts: [],
    }));

    server.setRequestHandler(ListToolsRequestSchema, async () => {
        logToStderr('debug', 'Generating tools list...');
        return {tools: TOOLS};
    });

    server.setRequestHandler(CallToolRequestSchema, async (request: CallToolRequest): Promise<ServerResult> => {
        const {name, arguments: args} = request.params;
        const startTime = Date.now();

        try {
            const handler = TOOL_HANDLERS[name];
            if (!handler) {
                logger.warn(`Unknown tool requested: ${name}`);
                return createErrorResponse(`Unknown tool: ${name}`);
            }

            const result = await handler(args);
            logger.debug(`${name} finished in ${Date.now() - startTime}ms${result.isError ? ' (error)' : ''}`);
            return result;
        } catch (error) {
            const errorMessage = error instanceof Error ? error.message : String(error);
            logger.error(`${name} failed: ${errorMessage}`);
            return createErrorResponse(errorMessage);
        }
    });

    return server;
}
