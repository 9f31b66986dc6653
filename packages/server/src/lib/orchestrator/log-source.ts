/**
 * Log sources — split a log into fixed-size chunks of lines.
 */

import { once } from 'node:events';
import { createReadStream } from 'node:fs';
import { createInterface } from 'node:readline';
import { parseLeadingTimestamp, type LogLine } from '@runwatch/core';

function assertChunkSize(chunkSize: number): void {
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
}

export function toLogLine(text: string, chunkIndex: number, lineIndex: number): LogLine {
  const timestamp = parseLeadingTimestamp(text);
  return timestamp === undefined ? { text, chunkIndex, lineIndex } : { text, timestamp, chunkIndex, lineIndex };
}

/** Split in-memory lines into chunks */
export function* chunkLines(lines: Iterable<string>, chunkSize: number): Generator<string[]> {
  assertChunkSize(chunkSize);
  let chunk: string[] = [];
  for (const line of lines) {
    chunk.push(line);
    if (chunk.length === chunkSize) {
      yield chunk;
      chunk = [];
    }
  }
  if (chunk.length > 0) yield chunk;
}

/** Stream a log file as chunks of lines */
export async function* readLogChunks(path: string, chunkSize: number): AsyncGenerator<string[]> {
  assertChunkSize(chunkSize);
  const input = createReadStream(path, 'utf-8');
  await once(input, 'open');
  const reader = createInterface({ input, crlfDelay: Infinity });
  let chunk: string[] = [];
  try {
    for await (const line of reader) {
      chunk.push(line);
      if (chunk.length === chunkSize) {
        yield chunk;
        chunk = [];
      }
    }
  } finally {
    reader.close();
    // closing the interface leaves the file open when the consumer stops early
    input.destroy();
  }
  if (chunk.length > 0) yield chunk;
}
