/**
 * Thin input/output wrappers around the pure transformation
 */

import { readFile, writeFile } from 'fs/promises';
import { text } from 'stream/consumers';
import type { Readable, Writable } from 'stream';
import { ioLogger } from './logger';

/** File path, readable stream, or HTML already in memory */
export type InputSource = string | Readable | { html: string };

/** File path or writable stream */
export type OutputSink = string | Writable;

export const readInput = async (input: InputSource): Promise<string> => {
  if (typeof input === 'string') {
    ioLogger.debug('Reading input file', { path: input });
    return readFile(input, 'utf-8');
  }
  if ('html' in input) {
    return input.html;
  }
  ioLogger.debug('Reading input stream');
  return text(input);
};

export const writeOutput = async (output: OutputSink, html: string): Promise<void> => {
  if (typeof output === 'string') {
    ioLogger.debug('Writing output file', { path: output, bytes: Buffer.byteLength(html) });
    await writeFile(output, html, 'utf-8');
    return;
  }

  await new Promise<void>((resolve, reject) => {
    output.write(html, 'utf-8', (error) => {
      if (error) reject(error);
      else resolve();
    });
  });
};
