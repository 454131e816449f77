/**
 * Fragment naming helpers: sequence parsing and archive file names.
 */

import { basename, extname } from 'path';

const TRAILING_DIGITS = /(\d+)$/;
const ANY_DIGITS = /(\d+)/;
const ARCHIVE_NAME = /^full_(\d+)_to_(\d+)\.txt$/;

/**
 * Parse the sequence number encoded in a fragment file name.
 *
 * The trailing run of digits in the base name wins (`rec_2025_045.wav` is
 * 45); otherwise the first run of digits anywhere is used. Returns null
 * when the name carries no digits or the number is not a safe integer.
 */
export function parseSequence(fileName: string): number | null {
  const base = basename(fileName, extname(fileName));
  const match = TRAILING_DIGITS.exec(base) ?? ANY_DIGITS.exec(base);
  if (!match) {
    return null;
  }

  const value = Number(match[1]);
  return Number.isSafeInteger(value) ? value : null;
}

/** `full_007_to_012.txt` */
export function archiveFileName(start: number, end: number): string {
  return `full_${pad(start)}_to_${pad(end)}.txt`;
}

export function parseArchiveFileName(fileName: string): { start: number; end: number } | null {
  const match = ARCHIVE_NAME.exec(fileName);
  if (!match) {
    return null;
  }
  return { start: Number(match[1]), end: Number(match[2]) };
}

function pad(value: number): string {
  return String(value).padStart(3, '0');
}
