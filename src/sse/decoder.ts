import type { Logger } from '../infrastructure/utils/logger.js';

export const DONE_SENTINEL = '[DONE]';

export type DecodedEvent =
  | { kind: 'event'; fields: Record<string, string>; data?: unknown }
  | { kind: 'done'; fields: Record<string, string> };

/**
 * Parse a single SSE line into `[key, value]`. Comments and blank lines give
 * null; a line without a colon is a field with an empty value.
 */
export function parseLine(line: string): [string, string] | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith(':')) {
    return null;
  }

  const colon = trimmed.indexOf(':');
  if (colon === -1) {
    return [trimmed, ''];
  }
  return [trimmed.slice(0, colon).trim(), trimmed.slice(colon + 1).trim()];
}

/**
 * Decode one framed record. Multiple `data` lines are joined with '\n' before
 * JSON parsing; a payload that is not JSON is kept as the raw string.
 */
export function decodeEvent(record: string): DecodedEvent | null {
  const fields: Record<string, string> = {};
  const dataLines: string[] = [];

  for (const line of record.split('\n')) {
    const parsed = parseLine(line);
    if (!parsed) continue;

    const [key, value] = parsed;
    if (key === 'data') {
      dataLines.push(value);
    } else {
      fields[key] = value;
    }
  }

  if (dataLines.length === 0) {
    return Object.keys(fields).length > 0 ? { kind: 'event', fields } : null;
  }

  const payload = dataLines.join('\n');
  if (payload === DONE_SENTINEL) {
    return { kind: 'done', fields };
  }

  try {
    const data: unknown = JSON.parse(payload);
    return { kind: 'event', fields, data };
  } catch {
    return { kind: 'event', fields, data: payload };
  }
}

/**
 * Records → data payloads. Stops at the `[DONE]` sentinel, which also closes
 * the record source.
 */
export function* readPayloads(records: Iterable<string>, logger?: Logger): Generator<unknown, void, undefined> {
  for (const record of records) {
    const event = decodeEvent(record);
    if (!event) continue;
    if (event.kind === 'done') {
      logger?.debug('Stream sentinel received', { module: 'sse-decoder' });
      return;
    }
    if (event.data !== undefined) yield event.data;
  }
}

export async function* readPayloadsAsync(
  records: AsyncIterable<string> | Iterable<string>,
  logger?: Logger
): AsyncGenerator<unknown, void, undefined> {
  for await (const record of records) {
    const event = decodeEvent(record);
    if (!event) continue;
    if (event.kind === 'done') {
      logger?.debug('Stream sentinel received', { module: 'sse-decoder' });
      return;
    }
    if (event.data !== undefined) yield event.data;
  }
}
