import { randomUUID } from 'crypto';
import type { ContentBlock, Message, StopReason, Usage } from '../types/index.js';
import { getDefaultLogger } from '../infrastructure/utils/logger.js';
import { asArray, asCount, asString, isObject, parseToolArguments } from './core/json.js';
import { mapFinishReason } from './maps.js';
import type { MapperOptions } from './request.js';

export const UNKNOWN_MODEL = 'unknown';

/**
 * Identifier for responses that arrive without one. The `msg_` prefix keeps
 * it apart from upstream `chatcmpl-` ids.
 */
export function generateMessageId(): string {
  return `msg_${randomUUID().replace(/-/g, '')}`;
}

/**
 * Parsed ChatCompletion response body → Messages `Message`.
 *
 * Only the first choice is read. Malformed tool-call arguments become `{}`.
 */
export function mapResponse(body: unknown, options: MapperOptions = {}): Message {
  const logger = options.logger ?? getDefaultLogger();
  const response = isObject(body) ? body : {};

  const firstChoice = asArray(response.choices)[0];
  const choice = isObject(firstChoice) ? firstChoice : {};
  const message = isObject(choice.message) ? choice.message : {};

  const content: ContentBlock[] = [];

  const text = asString(message.content);
  if (text) {
    content.push({ type: 'text', text });
  }

  for (const entry of asArray(message.tool_calls)) {
    if (!isObject(entry) || !isObject(entry.function)) continue;

    const fn = entry.function;
    content.push({
      type: 'tool_use',
      id: asString(entry.id) ?? '',
      name: asString(fn.name) ?? '',
      input: parseToolArguments(asString(fn.arguments))
    });
  }

  const finishReason = asString(choice.finish_reason);
  const stopReason: StopReason | null = finishReason === undefined ? null : mapFinishReason(finishReason);

  const usageData = isObject(response.usage) ? response.usage : {};
  const usage: Usage = {
    input_tokens: asCount(usageData.prompt_tokens),
    output_tokens: asCount(usageData.completion_tokens)
  };

  const result: Message = {
    id: asString(response.id) || generateMessageId(),
    type: 'message',
    role: 'assistant',
    content,
    model: asString(response.model) ?? UNKNOWN_MODEL,
    stop_reason: stopReason,
    stop_sequence: null,
    usage
  };

  logger.debug('Mapped ChatCompletion response to Message', {
    id: result.id,
    model: result.model,
    blockCount: content.length,
    stopReason,
    module: 'response-mapper'
  });

  return result;
}
