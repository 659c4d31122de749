// src/batch.ts
// Directory runner: one JSON outline per PDF, processed strictly one after another.

import { mkdir, readFile, readdir, rename, rm, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { ConfigurationError } from './errors';
import { parsePdfToOutline, serializeOutline } from './pdf';
import type { OutlinePipelineOpts, OutlineResult } from './pdf';
import type { BatchSummary, PdfOutlineConfig } from './types';

export type OutlineParser = (
  data: Uint8Array,
  sourceName: string,
  opts?: OutlinePipelineOpts
) => Promise<OutlineResult | null>;

async function isDirectory(dir: string): Promise<boolean> {
  try {
    return (await stat(dir)).isDirectory();
  } catch {
    // ENOENT and friends all mean "not usable as input".
    return false;
  }
}

export async function listPdfFiles(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((e) => e.isFile() && e.name.toLowerCase().endsWith('.pdf'))
    .map((e) => e.name)
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

export function outputNameFor(pdfName: string): string {
  return `${path.parse(pdfName).name}.json`;
}

// Readers never see a half-written file.
export async function writeFileAtomic(target: string, contents: string): Promise<void> {
  const tmp = `${target}.${process.pid}.tmp`;
  try {
    await writeFile(tmp, contents, { encoding: 'utf-8' });
    await rename(tmp, target);
  } catch (err) {
    await rm(tmp, { force: true });
    throw err;
  }
}

export async function processDirectory(
  config: PdfOutlineConfig,
  parse: OutlineParser = parsePdfToOutline
): Promise<BatchSummary> {
  if (!(await isDirectory(config.inputDir))) {
    throw new ConfigurationError(`Input directory not found at ${config.inputDir}`);
  }
  await mkdir(config.outputDir, { recursive: true });

  const summary: BatchSummary = { processed: 0, written: [], failed: [] };

  for (const name of await listPdfFiles(config.inputDir)) {
    const pdfPath = path.join(config.inputDir, name);
    console.log(`[pdf-outline] processing ${pdfPath}...`);
    summary.processed++;

    let data: Uint8Array;
    try {
      data = new Uint8Array(await readFile(pdfPath));
    } catch (err) {
      console.error(`[pdf-outline] failed to read ${pdfPath}`, { err });
      summary.failed.push(pdfPath);
      continue;
    }

    const result = await parse(data, pdfPath, { profilePages: config.profilePages });
    if (!result) {
      summary.failed.push(pdfPath);
      continue;
    }

    const outPath = path.join(config.outputDir, outputNameFor(name));
    try {
      await writeFileAtomic(outPath, serializeOutline(result));
    } catch (err) {
      console.error(`[pdf-outline] failed to write ${outPath}`, { err });
      summary.failed.push(pdfPath);
      continue;
    }
    console.log(`[pdf-outline] created ${outPath}`);
    summary.written.push(outPath);
  }

  return summary;
}
