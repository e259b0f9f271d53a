import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { createInterface } from 'node:readline';
import { dirname } from 'node:path';
import type { Readable, Writable } from 'node:stream';

/**
 * Split a document into lines without their terminators.
 * A final terminator does not start an extra empty line.
 */
export function splitLines(text: string): string[] {
  if (text === '') {
    return [];
  }
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Read all lines of an input file. Rejects if the file cannot be opened.
 */
export async function readInputFile(path: string): Promise<string[]> {
  const text = await readFile(path, 'utf-8');
  return splitLines(text);
}

/**
 * Stream lines from a readable (stdin by default)
 */
export function readStreamLines(input: Readable = process.stdin): AsyncIterable<string> {
  return createInterface({ input, crlfDelay: Infinity });
}

/**
 * Write the report to a file, creating its directory, or to a stream
 */
export async function writeOutput(
  document: string,
  path?: string,
  output: Writable = process.stdout
): Promise<void> {
  if (path) {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, document, 'utf-8');
    return;
  }

  await new Promise<void>((resolve, reject) => {
    output.write(document, (error) => (error ? reject(error) : resolve()));
  });
}
