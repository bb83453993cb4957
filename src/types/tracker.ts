/**
 * Issue and statistics types reported by the Tracker
 */

export type FileIssueReason =
  | "read-error"
  | "render-error"
  | "convert-error"
  | "write-error";
export type DateIssueReason = "unrecognized-format";
export type ResourceIssueReason =
  | "invalid-json"
  | "schema-validation"
  | "read-error";

export interface FileIssue {
  type: "file";
  path: string;
  reason: FileIssueReason;
  details?: string;
}

export interface DateIssue {
  type: "date";
  path: string;
  reason: DateIssueReason;
  details?: string;
}

export interface ResourceIssue {
  type: "resource";
  path: string;
  reason: ResourceIssueReason;
  details?: string;
}

export type Issue = FileIssue | DateIssue | ResourceIssue;
export type IssueType = Issue["type"];

export interface ProcessingStats {
  totalFiles: number;
  convertedFiles: number;
  failedFiles: number;
  skippedFiles: number;
  dateFallbacks: number;
  renderFallbacks: number;
  issues: Issue[];
  duration: number;
}
