import type { ChatCompletionRequest, MessageCreateParams } from '../types/index.js';
import { getDefaultLogger, type Logger } from '../infrastructure/utils/logger.js';
import { toChatMessages } from './messages.js';
import { toChatTools, toChatToolChoice } from './tools.js';

export interface MapperOptions {
  logger?: Logger;
}

/**
 * Messages request → ChatCompletion request.
 *
 * Pure: the input is never mutated. `extra_body` keys are merged last and win
 * over anything computed here.
 */
export function mapRequest(params: MessageCreateParams, options: MapperOptions = {}): ChatCompletionRequest {
  const logger = options.logger ?? getDefaultLogger();

  const result: ChatCompletionRequest = {
    model: params.model,
    messages: toChatMessages(params.messages, params.system, logger)
  };

  // Sampling parameters are passed through unchanged
  if (params.max_tokens !== undefined) result.max_tokens = params.max_tokens;
  if (params.temperature !== undefined) result.temperature = params.temperature;
  if (params.top_p !== undefined) result.top_p = params.top_p;
  if (params.stop_sequences !== undefined) result.stop = params.stop_sequences;
  if (params.stream !== undefined) result.stream = params.stream;

  if (params.tools && params.tools.length > 0) {
    result.tools = toChatTools(params.tools);
  }

  if (params.tool_choice !== undefined && params.tool_choice !== null) {
    result.tool_choice = toChatToolChoice(params.tool_choice);
  }

  if (params.extra_body) {
    Object.assign(result, params.extra_body);
  }

  logger.debug('Mapped Messages request to ChatCompletion', {
    model: result.model,
    messageCount: result.messages.length,
    toolCount: result.tools?.length ?? 0,
    module: 'request-mapper'
  });

  return result;
}
