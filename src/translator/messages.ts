import type {
  ChatConversationMessage,
  ChatMessage,
  ChatToolCall,
  ChatToolMessage,
  ContentBlockParam,
  MessageParam,
  MessageRole,
  ToolResultBlockParam
} from '../types/index.js';
import type { Logger } from '../infrastructure/utils/logger.js';
import { isObject } from './core/json.js';

/**
 * Convert Messages-style conversation to ChatCompletion messages
 * @param messages - Source messages, in order
 * @param system - System prompt (becomes a leading `system` message)
 */
export function toChatMessages(
  messages: MessageParam[],
  system: string | undefined,
  logger: Logger
): ChatMessage[] {
  const chatMessages: ChatMessage[] = [];

  if (system) {
    chatMessages.push({ role: 'system', content: system });
  }

  messages.forEach((message, position) => {
    if (typeof message.content === 'string') {
      chatMessages.push({ role: message.role, content: message.content });
      return;
    }

    const converted = convertContentBlocks(message.role, message.content, logger);
    if (converted.length === 0) {
      logger.warn('Dropping message without mappable content blocks', {
        position,
        role: message.role,
        blockCount: message.content.length,
        module: 'request-mapper'
      });
      return;
    }
    chatMessages.push(...converted);
  });

  return chatMessages;
}

/**
 * Partition one message's content blocks: text and tool_use blocks fold into a
 * single role-tagged message, each tool_result becomes its own trailing `tool`
 * message.
 */
export function convertContentBlocks(
  role: MessageRole,
  blocks: ContentBlockParam[],
  logger: Logger
): ChatMessage[] {
  const textParts: string[] = [];
  const toolCalls: ChatToolCall[] = [];
  const toolResults: ChatToolMessage[] = [];

  for (const block of blocks) {
    switch (block.type) {
      case 'text':
        if (typeof block.text === 'string') textParts.push(block.text);
        break;

      case 'tool_use':
        toolCalls.push({
          id: block.id || '',
          type: 'function',
          function: {
            name: block.name || '',
            arguments: JSON.stringify(block.input ?? {})
          }
        });
        break;

      case 'tool_result':
        toolResults.push({
          role: 'tool',
          tool_call_id: block.tool_use_id || '',
          content: stringifyToolResultContent(block.content)
        });
        break;

      default:
        logger.debug('Skipping unsupported content block', {
          blockType: describeBlockType(block),
          module: 'request-mapper'
        });
    }
  }

  const result: ChatMessage[] = [];

  if (textParts.length > 0 || toolCalls.length > 0) {
    const main: ChatConversationMessage = {
      role,
      content: textParts.join('\n')
    };
    if (toolCalls.length > 0) main.tool_calls = toolCalls;
    result.push(main);
  }

  result.push(...toolResults);
  return result;
}

/**
 * Tool results are plain strings upstream. Text-only block arrays are joined
 * with newlines; anything else is serialised as JSON.
 */
export function stringifyToolResultContent(content: ToolResultBlockParam['content']): string {
  if (content === undefined || content === null) return '';
  if (typeof content === 'string') return content;

  if (Array.isArray(content) && content.length > 0) {
    const texts: string[] = [];
    for (const part of content) {
      if (!isTextPart(part)) return JSON.stringify(content);
      texts.push(part.text);
    }
    return texts.join('\n');
  }

  return JSON.stringify(content);
}

function isTextPart(value: unknown): value is { type: 'text'; text: string } {
  return isObject(value) && value.type === 'text' && typeof value.text === 'string';
}

function describeBlockType(block: unknown): string {
  return isObject(block) && typeof block.type === 'string' ? block.type : typeof block;
}
