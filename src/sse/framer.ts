/**
 * SSE record framing over arbitrarily chunked text.
 *
 * A record is the text between two blank-line delimiters. Fragment boundaries
 * never need to line up with record boundaries.
 */

import type { Logger } from '../infrastructure/utils/logger.js';

export const RECORD_DELIMITER = '\n\n';

export type TextChunk = string | Uint8Array;

export class SSEFramer {
  private buffer = '';

  /**
   * Feed one fragment and get back every record it completes, in order.
   */
  push(fragment: string): string[] {
    this.buffer += fragment;
    if (this.buffer.includes('\r')) {
      // A trailing '\r' stays until the next fragment shows whether '\n' follows
      this.buffer = this.buffer.replace(/\r\n/g, '\n');
    }

    const records: string[] = [];
    let delimiterAt = this.buffer.indexOf(RECORD_DELIMITER);
    while (delimiterAt !== -1) {
      records.push(this.buffer.slice(0, delimiterAt));
      this.buffer = this.buffer.slice(delimiterAt + RECORD_DELIMITER.length);
      delimiterAt = this.buffer.indexOf(RECORD_DELIMITER);
    }
    return records;
  }

  /**
   * End of input. The undelimited tail is discarded, never decoded; it is
   * returned so callers can log it.
   */
  flush(): string {
    const remainder = this.buffer;
    this.buffer = '';
    return remainder;
  }

  get pending(): number {
    return this.buffer.length;
  }
}

export function* frameEvents(fragments: Iterable<string>, logger?: Logger): Generator<string, void, undefined> {
  const framer = new SSEFramer();
  for (const fragment of fragments) {
    yield* framer.push(fragment);
  }
  logDiscardedTail(framer.flush(), logger);
}

export async function* frameEventsAsync(
  fragments: AsyncIterable<string> | Iterable<string>,
  logger?: Logger
): AsyncGenerator<string, void, undefined> {
  const framer = new SSEFramer();
  for await (const fragment of fragments) {
    yield* framer.push(fragment);
  }
  logDiscardedTail(framer.flush(), logger);
}

function logDiscardedTail(remainder: string, logger?: Logger): void {
  if (remainder.trim()) {
    logger?.debug('Discarding undelimited stream tail', { length: remainder.length, module: 'sse-framer' });
  }
}

/**
 * Bytes → text with a streaming UTF-8 decoder, so multi-byte characters split
 * across chunks survive.
 */
export function* decodeText(chunks: Iterable<TextChunk>): Generator<string, void, undefined> {
  const decoder = new TextDecoder('utf-8');
  for (const chunk of chunks) {
    const text = typeof chunk === 'string' ? chunk : decoder.decode(chunk, { stream: true });
    if (text) yield text;
  }
  const tail = decoder.decode();
  if (tail) yield tail;
}

export async function* decodeTextAsync(
  chunks: AsyncIterable<TextChunk> | Iterable<TextChunk>
): AsyncGenerator<string, void, undefined> {
  const decoder = new TextDecoder('utf-8');
  for await (const chunk of chunks) {
    const text = typeof chunk === 'string' ? chunk : decoder.decode(chunk, { stream: true });
    if (text) yield text;
  }
  const tail = decoder.decode();
  if (tail) yield tail;
}
