/**
 * Generator type definitions.
 */

/**
 * Options for a generation run.
 */
export interface GenerateOptions {
  /** Render every template but write nothing */
  dryRun?: boolean;
}

/**
 * One template rendered into the output directory.
 */
export interface GeneratedFile {
  /** Template path relative to the target's source directory */
  template: string;
  /** Output path relative to the target's output directory */
  output: string;
  /** Rendered size in characters */
  length: number;
}

/**
 * Result for a single target.
 */
export interface TargetResult {
  /** Target name from the configuration */
  target: string;
  /** Whether every template rendered and the output was written */
  success: boolean;
  /** Absolute output directory */
  outputDir: string;
  /** Rendered files (empty on failure) */
  files: GeneratedFile[];
  /** Static files copied verbatim, relative to both directories (empty on failure) */
  copied: string[];
  /** Template that failed to render, relative to the source directory */
  template?: string;
  /** Error message if failed */
  error?: string;
  /** Error code if failed */
  errorCode?: string;
}

/**
 * Result for a whole generation run.
 */
export interface GenerateSummary {
  results: TargetResult[];
  /** Names of targets that succeeded */
  generated: string[];
  /** Names of targets that failed */
  failed: string[];
}
