export class PdfOutlineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The file could not be opened or decoded as a PDF. Skips that file only. */
export class PdfDecodeError extends PdfOutlineError {
  readonly pageNum: number | null;

  constructor(readonly sourceName: string, options?: { cause?: unknown; pageNum?: number }) {
    const where = options?.pageNum !== undefined ? ` (page ${options.pageNum})` : '';
    super(`Failed to decode PDF: ${sourceName}${where}`, { cause: options?.cause });
    this.pageNum = options?.pageNum ?? null;
  }
}

/** Invalid run configuration (bad flag, missing input directory). Aborts the run. */
export class ConfigurationError extends PdfOutlineError {}
