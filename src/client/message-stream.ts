import type { Message, StreamingEvent, StreamingMessage } from '../types/index.js';
import type { Logger } from '../infrastructure/utils/logger.js';
import { StreamIncompleteError, toAPIError } from '../shared/errors/index.js';
import type { TextChunk } from '../sse/framer.js';
import { StreamTransducer } from '../translator/streaming.js';
import { streamEventsAsync } from '../translator/stream-pipeline.js';
import { UNKNOWN_MODEL, generateMessageId } from '../translator/response.js';

/**
 * A streaming response as Messages events. Single pass: the body is read
 * once, so a second iteration throws. Breaking out of the loop aborts the
 * underlying request.
 */
export class MessageStream implements AsyncIterable<StreamingEvent> {
  private readonly transducer: StreamTransducer;
  private consumed = false;

  constructor(
    private readonly body: AsyncIterable<TextChunk>,
    private readonly controller: AbortController,
    private readonly logger: Logger,
    private readonly release: () => void = () => undefined
  ) {
    this.transducer = new StreamTransducer({ logger });
  }

  /** True once `message_stop` has been seen. */
  get completed(): boolean {
    return this.transducer.isComplete;
  }

  get aborted(): boolean {
    return this.controller.signal.aborted;
  }

  abort(): void {
    this.controller.abort();
    this.release();
  }

  currentMessage(): StreamingMessage {
    return this.transducer.snapshot();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<StreamingEvent, void, undefined> {
    if (this.consumed) {
      throw new Error('MessageStream can only be iterated once');
    }
    this.consumed = true;

    let drained = false;
    try {
      yield* streamEventsAsync(this.body, { logger: this.logger, transducer: this.transducer });
      drained = true;
    } catch (error) {
      if (this.aborted) {
        this.logger.debug('Stream aborted by caller', { module: 'message-stream' });
        return;
      }
      this.logger.error('Error reading upstream stream', error, { module: 'message-stream' });
      throw toAPIError(error);
    } finally {
      if (!drained && !this.aborted) {
        this.controller.abort();
      }
      this.release();
    }

    if (!this.completed) {
      this.logger.warn('Upstream stream ended before message_stop', {
        blockCount: this.transducer.blockCount,
        module: 'message-stream'
      });
    }
  }

  /**
   * Drain the stream (unless already consumed) and return the assembled
   * message.
   */
  async finalMessage(): Promise<Message> {
    if (!this.consumed) {
      const iterator = this[Symbol.asyncIterator]();
      let step = await iterator.next();
      while (!step.done) {
        step = await iterator.next();
      }
    }

    if (!this.completed) {
      throw new StreamIncompleteError();
    }

    const snapshot = this.transducer.snapshot();
    return {
      id: snapshot.id || generateMessageId(),
      type: 'message',
      role: 'assistant',
      content: snapshot.content,
      model: snapshot.model || UNKNOWN_MODEL,
      stop_reason: snapshot.stop_reason,
      stop_sequence: snapshot.stop_sequence,
      usage: snapshot.usage ?? { input_tokens: 0, output_tokens: 0 }
    };
  }
}
