import type { JsonObject } from './json.types.js';

export type StopReason = 'end_turn' | 'max_tokens' | 'stop_sequence' | 'tool_use';

export interface TextBlock {
  type: 'text';
  text: string;
}

export interface ToolUseBlock {
  type: 'tool_use';
  id: string;
  name: string;
  input: JsonObject;
}

/**
 * One addressable unit of assistant output, ordered by index within a message.
 */
export type ContentBlock = TextBlock | ToolUseBlock;

export interface Usage {
  readonly input_tokens: number;
  readonly output_tokens: number;
}

/**
 * Final (non-streaming) assistant message.
 */
export interface Message {
  readonly id: string;
  readonly type: 'message';
  readonly role: 'assistant';
  readonly content: readonly ContentBlock[];
  readonly model: string;
  readonly stop_reason: StopReason | null;
  readonly stop_sequence: string | null;
  readonly usage: Usage;
}
