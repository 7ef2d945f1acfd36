/**
 * File utilities for run output
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { OUTPUT_FILE_PREFIX } from '../config/constants';
import { DateUtils } from './date-utils';

/**
 * 确保目录存在
 */
export async function ensureDirExists(dir: string): Promise<void> {
  await fs.mkdir(dir, { recursive: true });
}

/**
 * tweets_20240101_093005.csv
 */
export function buildOutputFilename(timestamp: Date, extension: string): string {
  return `${OUTPUT_FILE_PREFIX}_${DateUtils.formatFileTimestamp(timestamp)}.${extension}`;
}

export function resolveOutputPath(outputDir: string, timestamp: Date, extension: string): string {
  return path.resolve(outputDir, buildOutputFilename(timestamp, extension));
}

/**
 * Write a new file, failing with EEXIST instead of replacing an existing one.
 */
export async function writeNewFile(filePath: string, content: string): Promise<void> {
  await fs.writeFile(filePath, content, { encoding: 'utf-8', flag: 'wx' });
}
