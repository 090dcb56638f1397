import type {
  Message,
  MessageCreateParams,
  MessageCreateParamsNonStreaming,
  MessageCreateParamsStreaming
} from '../types/index.js';
import { BadRequestError, InternalServerError } from '../shared/errors/index.js';
import { sanitizeForLogging } from '../infrastructure/utils/sanitize.js';
import { validateMessageCreateParams } from '../validation/request-validator.js';
import { mapRequest } from '../translator/request.js';
import { mapResponse } from '../translator/response.js';
import { MessageStream } from './message-stream.js';
import type { BridgeClient } from './bridge-client.js';

export interface RequestOptions {
  signal?: AbortSignal;
}

export const CHAT_COMPLETIONS_PATH = '/chat/completions';

export class Messages {
  constructor(private readonly client: BridgeClient) {}

  create(params: MessageCreateParamsNonStreaming, options?: RequestOptions): Promise<Message>;
  create(params: MessageCreateParamsStreaming, options?: RequestOptions): Promise<MessageStream>;
  create(params: MessageCreateParams, options?: RequestOptions): Promise<Message | MessageStream>;
  async create(params: MessageCreateParams, options: RequestOptions = {}): Promise<Message | MessageStream> {
    const logger = this.client.logger;

    if (this.client.validateRequests) {
      const result = validateMessageCreateParams(params);
      if (!result.valid) {
        const details = (result.errors ?? []).join('; ');
        logger.warn('Rejected invalid Messages request', { errors: result.errors, module: 'messages' });
        throw new BadRequestError(`Invalid request: ${details}`);
      }
    }

    const request = mapRequest(params, { logger });
    const stream = params.stream === true;

    logger.debug('Sending ChatCompletion request', {
      model: request.model,
      stream,
      request: sanitizeForLogging(request),
      module: 'messages'
    });

    const { response, controller, release } = await this.client.post(CHAT_COMPLETIONS_PATH, request, {
      stream,
      signal: options.signal
    });

    if (stream) {
      if (!response.body) {
        controller.abort();
        release();
        throw new InternalServerError('Upstream returned no body for a streaming request', response.status);
      }
      return new MessageStream(response.body, controller, logger, release);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new InternalServerError(`Invalid JSON in upstream response: ${reason}`, response.status);
    } finally {
      release();
    }

    const message = mapResponse(body, { logger });
    logger.debug('Received ChatCompletion response', {
      id: message.id,
      model: message.model,
      stopReason: message.stop_reason,
      module: 'messages'
    });
    return message;
  }
}
