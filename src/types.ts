export interface PdfOutlineConfig {
  /** Directory scanned (non-recursively) for *.pdf files */
  inputDir: string;
  /** Directory receiving one <name>.json per processed PDF; created if absent */
  outputDir: string;
  /** Pages sampled when profiling font sizes */
  profilePages: number;
  help: boolean;
}

export const DEFAULT_CONFIG: PdfOutlineConfig = {
  inputDir: 'input',
  outputDir: 'output',
  profilePages: 20,
  help: false
};

export const ENV_INPUT_DIR = 'PDF_OUTLINE_INPUT_DIR';
export const ENV_OUTPUT_DIR = 'PDF_OUTLINE_OUTPUT_DIR';
export const ENV_PROFILE_PAGES = 'PDF_OUTLINE_PROFILE_PAGES';

export interface BatchSummary {
  processed: number;
  /** Output paths, in processing order */
  written: string[];
  /** Input paths that produced no output */
  failed: string[];
}
