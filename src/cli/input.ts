/**
 * Input helpers shared by the text-processing commands.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { text } from 'node:stream/consumers';

/** Label used for stdin in reports */
export const STDIN_LABEL = '<stdin>';

/**
 * Read a file, or stdin when the path is missing or `-`.
 */
export async function readInput(file?: string): Promise<string> {
  if (!file || file === '-') {
    return text(process.stdin);
  }
  return readFile(file, 'utf-8');
}

export function inputLabel(file?: string): string {
  return !file || file === '-' ? STDIN_LABEL : file;
}

/**
 * Write to a file, or stdout when no path is given.
 */
export async function writeOutput(content: string, file?: string): Promise<void> {
  if (!file || file === '-') {
    process.stdout.write(content);
    return;
  }
  await writeFile(file, content, 'utf-8');
}
