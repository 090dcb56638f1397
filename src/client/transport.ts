import fetch from 'node-fetch';
import type { TextChunk } from '../sse/framer.js';

export interface TransportRequest {
  method: 'POST';
  headers: Record<string, string>;
  body: string;
  signal?: AbortSignal;
}

/**
 * The slice of an HTTP response the client reads. `body` is consumed at most
 * once, and only for streaming requests.
 */
export interface TransportResponse {
  status: number;
  ok: boolean;
  json(): Promise<unknown>;
  body: AsyncIterable<TextChunk> | null;
}

export type Transport = (url: string, init: TransportRequest) => Promise<TransportResponse>;

export function createFetchTransport(): Transport {
  return async (url, init) => {
    const response = await fetch(url, {
      method: init.method,
      headers: init.headers,
      body: init.body,
      signal: init.signal
    });

    return {
      status: response.status,
      ok: response.ok,
      json: () => response.json(),
      body: response.body
    };
  };
}
