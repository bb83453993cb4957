/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const InputConfigSchema = z.object({
  directory: z.string(),
  encoding: z.enum(["utf-8", "utf8", "latin1"]),
});

export const OutputConfigSchema = z.object({
  directory: z.string(),
  extension: z.string().startsWith("."),
  layout: z.string().min(1),
});

export const FrontmatterConfigSchema = z.object({
  defaultTitle: z.string(),
  // Emitted verbatim after `tags:` when a post has no tags line
  defaultTags: z.string(),
});

export const SlugConfigSchema = z.object({
  maxLength: z.number().int().positive(),
  fallback: z.string().regex(/^[a-z0-9]+(-[a-z0-9]+)*$/),
});

export const MarkdownConfigSchema = z.object({
  gfm: z.boolean(),
  breaks: z.boolean(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
});

export const ConversionConfigSchema = z.object({
  input: InputConfigSchema,
  output: OutputConfigSchema,
  frontmatter: FrontmatterConfigSchema,
  slug: SlugConfigSchema,
  markdown: MarkdownConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialConversionConfigSchema = z.object({
  input: InputConfigSchema.partial().optional(),
  output: OutputConfigSchema.partial().optional(),
  frontmatter: FrontmatterConfigSchema.partial().optional(),
  slug: SlugConfigSchema.partial().optional(),
  markdown: MarkdownConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type InputConfig = z.infer<typeof InputConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type FrontmatterConfig = z.infer<typeof FrontmatterConfigSchema>;
export type SlugConfig = z.infer<typeof SlugConfigSchema>;
export type MarkdownConfig = z.infer<typeof MarkdownConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type ConversionConfig = z.infer<typeof ConversionConfigSchema>;
export type PartialConversionConfig = z.infer<
  typeof PartialConversionConfigSchema
>;

export interface ConfigError {
  path: string;
  error: unknown;
}
