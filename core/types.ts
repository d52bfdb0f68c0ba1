/**
 * Core type definitions for the mirror config manager
 */

export interface ExtractedBlock {
  /** Block text, lines joined with "\n" */
  text: string;
  /** Zero-based index of the standalone opening-brace line */
  startLine: number;
  /** Zero-based index of the line where brace depth returns to zero */
  endLine: number;
}

export interface AssemblyPlan {
  /** Module names in output order */
  modules: string[];
  /** Append the paged section after the last module */
  usePages: boolean;
  /** Substituted for the placeholder token in the paged section */
  pagesModuleName?: string;
}

export type FragmentSource = "master" | "documentation" | "sample";

export interface PopulateReport {
  created: Array<{ name: string; source: FragmentSource }>;
  existing: string[];
  skipped: string[];
  protected: string[];
}

export interface ProcessSettings {
  /** Used when detection is inconclusive */
  fallbackName: string;
  /** Exact (lower-cased) process names that identify the mirror */
  knownNames: string[];
  /** Case-insensitive substring of the process exec path */
  pathHint: string;
}

export interface Settings {
  mirrorHome: string;
  workspace: string;
  pagesModule: string;
  placeholder: string;
  indent: string;
  fragmentExtension: string;
  baselineModules: string[];
  protectedPrefix: string;
  process: ProcessSettings;
  verifyTimeoutMs: number;
}

export interface WorkspaceLayout {
  head: string;
  tail: string;
  pages: string;
  fragmentsDir: string;
  master: string;
  masterBackup: string;
  output: string;
  outputBackup: string;
  snapshotManifest: string;
  lockFile: string;
  modulesDir: string;
}

export interface SnapshotManifest {
  timestamp: string;
  files: Array<{
    original: string;
    backup: string;
    /** null when the original did not exist at capture time */
    hash: string | null;
  }>;
}

export type TransactionState =
  | "idle"
  | "backed-up"
  | "applied"
  | "accepted"
  | "rolled-back";

export interface ProcessDescriptor {
  name: string;
  status?: string;
  execPath?: string;
}

export enum ErrorSeverity {
  ERROR = "error",
  WARNING = "warning",
  INFO = "info",
}

export interface ConfigError {
  severity: ErrorSeverity;
  code: string;
  message: string;
  file?: string;
  suggestion?: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ConfigError[];
}

export interface Prompter {
  confirm(question: string): Promise<boolean>;
  /** Resolves to null when the user cancels */
  choose(title: string, items: string[]): Promise<string | null>;
}

export interface ConfigManagerOptions {
  settings: Settings;
  /** Detailed output */
  verbose?: boolean;
}
