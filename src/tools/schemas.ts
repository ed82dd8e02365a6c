import { z } from "zod";

const DocumentPathSchema = z.string().min(1, "path must not be empty");

const PositionSchema = z.enum(['before', 'after']).default('after');

// Read tools schemas
export const GetDocumentInfoArgsSchema = z.object({
  path: DocumentPathSchema,
});

export const GetDocumentTextArgsSchema = z.object({
  path: DocumentPathSchema,
});

export const GetDocumentOutlineArgsSchema = z.object({
  path: DocumentPathSchema,
});

export const GetDocumentXmlArgsSchema = z.object({
  path: DocumentPathSchema,
});

// Search / edit tools schemas
export const FindTextInDocumentArgsSchema = z.object({
  path: DocumentPathSchema,
  text: z.string().min(1),
  partial_match: z.boolean().optional().default(true),
});

export const SearchAndReplaceArgsSchema = z.object({
  path: DocumentPathSchema,
  find_text: z.string().min(1),
  replace_text: z.string(),
});

// Insertion tools schemas
export const InsertHeaderNearTextArgsSchema = z.object({
  path: DocumentPathSchema,
  target_text: z.string().min(1),
  header_title: z.string(),
  position: PositionSchema,
  // Falls back to the configured defaultHeaderStyle
  header_style: z.string().min(1).optional(),
});

export const InsertLineOrParagraphNearTextArgsSchema = z.object({
  path: DocumentPathSchema,
  target_text: z.string().min(1),
  line_text: z.string(),
  position: PositionSchema,
  line_style: z.string().min(1).optional(),
});
