import type { JsonObject } from './json.types.js';
import type { ContentBlock, StopReason, Usage } from './response.types.js';

/**
 * In-progress message owned by a single stream transducer.
 * `content` only grows; `stop_reason` and `usage` are filled once, at the end.
 */
export interface StreamingMessage {
  id: string;
  type: 'message';
  role: string;
  content: ContentBlock[];
  model: string;
  stop_reason: StopReason | null;
  stop_sequence: string | null;
  usage: Usage | null;
}

export interface TextDelta {
  type: 'text_delta';
  text: string;
}

export interface InputDelta {
  type: 'input_delta';
  input: JsonObject;
}

export type ContentDelta = TextDelta | InputDelta;

export interface MessageStartEvent {
  type: 'message_start';
  message: StreamingMessage;
}

export interface ContentBlockStartEvent {
  type: 'content_block_start';
  index: number;
  content_block: ContentBlock;
}

export interface ContentBlockDeltaEvent {
  type: 'content_block_delta';
  index: number;
  delta: ContentDelta;
}

export interface ContentBlockStopEvent {
  type: 'content_block_stop';
  index: number;
}

export interface MessageDeltaEvent {
  type: 'message_delta';
  delta: {
    stop_reason: StopReason | null;
    stop_sequence: string | null;
  };
  usage: Usage | null;
}

export interface MessageStopEvent {
  type: 'message_stop';
}

export type StreamingEvent =
  | MessageStartEvent
  | ContentBlockStartEvent
  | ContentBlockDeltaEvent
  | ContentBlockStopEvent
  | MessageDeltaEvent
  | MessageStopEvent;

export type StreamingEventType = StreamingEvent['type'];
