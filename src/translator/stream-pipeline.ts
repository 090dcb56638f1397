import type { StreamingEvent } from '../types/index.js';
import { getDefaultLogger, type Logger } from '../infrastructure/utils/logger.js';
import { decodeText, decodeTextAsync, frameEvents, frameEventsAsync, type TextChunk } from '../sse/framer.js';
import { readPayloads, readPayloadsAsync } from '../sse/decoder.js';
import { StreamTransducer } from './streaming.js';

export interface StreamEventsOptions {
  logger?: Logger;
  /** Supply one to inspect `isComplete` or `snapshot()` after the run. */
  transducer?: StreamTransducer;
}

/**
 * Raw SSE body (bytes or text, any chunking) → Messages streaming events.
 * Lazy end to end: nothing is read until the caller pulls, and stopping early
 * closes the source.
 */
export function streamEvents(
  source: Iterable<TextChunk>,
  options: StreamEventsOptions = {}
): Generator<StreamingEvent, void, undefined> {
  const logger = options.logger ?? getDefaultLogger();
  const transducer = options.transducer ?? new StreamTransducer({ logger });
  return transducer.run(readPayloads(frameEvents(decodeText(source), logger), logger));
}

export function streamEventsAsync(
  source: AsyncIterable<TextChunk> | Iterable<TextChunk>,
  options: StreamEventsOptions = {}
): AsyncGenerator<StreamingEvent, void, undefined> {
  const logger = options.logger ?? getDefaultLogger();
  const transducer = options.transducer ?? new StreamTransducer({ logger });
  return transducer.runAsync(readPayloadsAsync(frameEventsAsync(decodeTextAsync(source), logger), logger));
}
