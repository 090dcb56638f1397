import type { JsonObject, JsonValue } from './json.types.js';

export type MessageRole = 'user' | 'assistant';

export interface TextBlockParam {
  type: 'text';
  text: string;
}

export interface ToolUseBlockParam {
  type: 'tool_use';
  id: string;
  name: string;
  input?: JsonObject;
}

export interface ToolResultBlockParam {
  type: 'tool_result';
  tool_use_id: string;
  content?: string | JsonValue;
  is_error?: boolean;
}

export type ContentBlockParam = TextBlockParam | ToolUseBlockParam | ToolResultBlockParam;

export interface MessageParam {
  role: MessageRole;
  content: string | ContentBlockParam[];
}

export interface ToolDefinition {
  name: string;
  description?: string;
  input_schema?: JsonObject;
}

/**
 * `'auto' | 'any' | 'required'` or `{ type: 'tool', name }`; other shapes fall back to auto.
 */
export type ToolChoiceParam = string | { type: string; name?: string };

export interface MessageCreateParamsBase {
  model: string;
  messages: MessageParam[];
  max_tokens: number;
  system?: string;
  temperature?: number;
  top_p?: number;
  stop_sequences?: string[];
  stream?: boolean;
  tools?: ToolDefinition[];
  tool_choice?: ToolChoiceParam;
  /**
   * Extra keys sent upstream as-is. Merged last, so they override mapped fields.
   */
  extra_body?: Record<string, JsonValue>;
}

export interface MessageCreateParamsNonStreaming extends MessageCreateParamsBase {
  stream?: false;
}

export interface MessageCreateParamsStreaming extends MessageCreateParamsBase {
  stream: true;
}

export type MessageCreateParams = MessageCreateParamsNonStreaming | MessageCreateParamsStreaming;
