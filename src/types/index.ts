/**
 * Central type exports
 */

// Configuration
export type {
  ConversionConfig,
  PartialConversionConfig,
  InputConfig,
  OutputConfig,
  FrontmatterConfig,
  SlugConfig,
  MarkdownConfig,
  LoggingConfig,
  LogLevel,
  ConfigError,
} from "./config";
export {
  ConversionConfigSchema,
  PartialConversionConfigSchema,
} from "./config";

// Posts
export type {
  RawPost,
  PostMetadata,
  RenderedPost,
  PostDescriptor,
} from "./files";

// Tracking
export type {
  Issue,
  IssueType,
  FileIssue,
  DateIssue,
  ResourceIssue,
  FileIssueReason,
  DateIssueReason,
  ResourceIssueReason,
  ProcessingStats,
} from "./tracker";

// Context
export type { ConversionContext } from "./context";
