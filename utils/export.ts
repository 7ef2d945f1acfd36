/**
 * Output writer: one timestamp-named CSV or JSON file per run
 */

import { OUTPUT_FORMATS } from '../config/constants';
import { SearchErrors } from '../core/errors';
import { POST_OUTPUT_COLUMNS, toOutputRow, type PostOutputRow, type PostRecord } from '../types/post';
import { ensureDirExists, resolveOutputPath, writeNewFile } from './fileutils';

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export interface ExportOptions {
  format: OutputFormat;
  outputDir: string;
  /** Names the file; defaults to the current time */
  timestamp?: Date;
}

function escapeCsvField(value: PostOutputRow[keyof PostOutputRow]): string {
  if (value === null || value === undefined) {
    return '';
  }
  const text = String(value);
  const escaped = text.replace(/"/g, '""');
  return /[,"\n\r]/.test(text) ? `"${escaped}"` : escaped;
}

export function serializeCsv(posts: readonly PostRecord[]): string {
  const rows = posts.map(toOutputRow);
  return [
    POST_OUTPUT_COLUMNS.join(','),
    ...rows.map((row) => POST_OUTPUT_COLUMNS.map((column) => escapeCsvField(row[column])).join(',')),
  ].join('\n');
}

export function serializeJson(posts: readonly PostRecord[]): string {
  return JSON.stringify(posts.map(toOutputRow), null, 2);
}

/**
 * Serialize the run's posts and write them to a new file.
 * Returns the absolute path of the file.
 */
export async function writeRunOutput(posts: readonly PostRecord[], options: ExportOptions): Promise<string> {
  const timestamp = options.timestamp ?? new Date();
  const outputPath = resolveOutputPath(options.outputDir, timestamp, options.format);
  const content = options.format === 'csv' ? serializeCsv(posts) : serializeJson(posts);

  try {
    await ensureDirExists(options.outputDir);
    await writeNewFile(outputPath, content);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw SearchErrors.fileSystem(`Failed to write ${outputPath}: ${cause.message}`, cause, {
      outputPath,
    });
  }

  return outputPath;
}
