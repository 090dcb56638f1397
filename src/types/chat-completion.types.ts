import type { JsonObject } from './json.types.js';

/**
 * Upstream ChatCompletion wire shapes.
 */

export type FinishReason = 'stop' | 'length' | 'tool_calls' | 'function_call' | 'content_filter';

export interface ChatToolCall {
  id: string;
  type: 'function';
  function: {
    name: string;
    arguments: string;
  };
}

export interface ChatSystemMessage {
  role: 'system';
  content: string;
}

export interface ChatConversationMessage {
  role: 'user' | 'assistant';
  content?: string;
  tool_calls?: ChatToolCall[];
}

export interface ChatToolMessage {
  role: 'tool';
  tool_call_id: string;
  content: string;
}

export type ChatMessage = ChatSystemMessage | ChatConversationMessage | ChatToolMessage;

export interface ChatTool {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: JsonObject;
  };
}

export type ChatToolChoice =
  | 'auto'
  | 'required'
  | { type: 'function'; function: { name: string } };

export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  max_tokens?: number;
  temperature?: number;
  top_p?: number;
  stop?: string[];
  stream?: boolean;
  tools?: ChatTool[];
  tool_choice?: ChatToolChoice;
  [key: string]: unknown;
}
