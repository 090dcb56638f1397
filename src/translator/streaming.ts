import type {
  ContentBlock,
  StreamingEvent,
  StreamingMessage,
  TextBlock,
  ToolUseBlock,
  Usage
} from '../types/index.js';
import { getDefaultLogger, type Logger } from '../infrastructure/utils/logger.js';
import { asArray, asCount, asString, isObject, parseToolArguments, tryParseJsonObject } from './core/json.js';
import { mapFinishReason } from './maps.js';

export interface StreamTransducerOptions {
  logger?: Logger;
}

/**
 * Tool-call block being assembled. Upstream identifies a call by `id` on its
 * first delta and by `index` on later fragments; both resolve here.
 */
interface OpenToolCall {
  index: number;
  block: ToolUseBlock;
  argumentsBuffer: string;
}

interface OpenTextBlock {
  index: number;
  block: TextBlock;
}

function createStreamingMessage(): StreamingMessage {
  return {
    id: '',
    type: 'message',
    role: 'assistant',
    content: [],
    model: '',
    stop_reason: null,
    stop_sequence: null,
    usage: null
  };
}

/**
 * Turns ChatCompletion delta chunks into Messages lifecycle events:
 * message_start, content_block_start/delta/stop, message_delta, message_stop.
 *
 * One instance per stream. Block indices are dense and handed out in
 * first-seen order; every emitted event carries a snapshot, so later state
 * changes never show through an event already handed to the caller.
 */
export class StreamTransducer {
  private readonly logger: Logger;
  private readonly message = createStreamingMessage();
  private started = false;
  private complete = false;
  private text: OpenTextBlock | undefined;
  private readonly toolsById = new Map<string, OpenToolCall>();
  private readonly toolsBySlot = new Map<number, OpenToolCall>();

  constructor(options: StreamTransducerOptions = {}) {
    this.logger = options.logger ?? getDefaultLogger();
  }

  /**
   * True once message_stop has been emitted. A source that ends while this is
   * still false was truncated.
   */
  get isComplete(): boolean {
    return this.complete;
  }

  get blockCount(): number {
    return this.message.content.length;
  }

  snapshot(): StreamingMessage {
    return structuredClone(this.message);
  }

  /**
   * Process one decoded chunk. Chunks after completion, non-object payloads
   * and chunks without choices produce nothing. A failure part-way through a
   * chunk is logged; the events produced before it are still returned.
   */
  push(chunk: unknown): StreamingEvent[] {
    const events: StreamingEvent[] = [];

    if (this.complete) {
      this.logger.debug('Ignoring chunk after message_stop', { module: 'stream-transducer' });
      return events;
    }

    try {
      this.process(chunk, events);
    } catch (error) {
      this.logger.error('Error processing streaming chunk', error, { module: 'stream-transducer' });
    }

    return events;
  }

  *run(chunks: Iterable<unknown>): Generator<StreamingEvent, void, undefined> {
    for (const chunk of chunks) {
      yield* this.push(chunk);
      if (this.complete) return;
    }
  }

  async *runAsync(chunks: AsyncIterable<unknown> | Iterable<unknown>): AsyncGenerator<StreamingEvent, void, undefined> {
    for await (const chunk of chunks) {
      yield* this.push(chunk);
      if (this.complete) return;
    }
  }

  private process(chunk: unknown, events: StreamingEvent[]): void {
    if (!isObject(chunk)) {
      this.logger.debug('Ignoring non-object stream payload', {
        payloadType: typeof chunk,
        module: 'stream-transducer'
      });
      return;
    }

    const choice = asArray(chunk.choices)[0];
    if (!isObject(choice)) {
      this.logger.debug('Ignoring chunk without choices', { module: 'stream-transducer' });
      return;
    }

    const delta = isObject(choice.delta) ? choice.delta : {};

    const role = asString(delta.role);
    if (role && !this.started) {
      this.start(chunk, role, events);
    }

    const text = asString(delta.content);
    if (text) {
      this.appendText(chunk, text, events);
    }

    asArray(delta.tool_calls).forEach((entry, position) => {
      this.applyToolCall(chunk, entry, position, events);
    });

    const finishReason = asString(choice.finish_reason);
    if (finishReason) {
      this.finish(chunk, finishReason, events);
    }
  }

  private start(chunk: Record<string, unknown>, role: string, events: StreamingEvent[]): void {
    this.message.id = asString(chunk.id) ?? '';
    this.message.model = asString(chunk.model) ?? '';
    this.message.role = role;
    this.started = true;
    events.push({ type: 'message_start', message: this.snapshot() });
  }

  // Content arriving before any role delta still gets a message_start first
  private ensureStarted(chunk: Record<string, unknown>, events: StreamingEvent[]): void {
    if (!this.started) {
      this.start(chunk, 'assistant', events);
    }
  }

  private openBlock(block: ContentBlock, events: StreamingEvent[]): number {
    const index = this.message.content.length;
    this.message.content.push(block);
    events.push({ type: 'content_block_start', index, content_block: structuredClone(block) });
    return index;
  }

  private appendText(chunk: Record<string, unknown>, text: string, events: StreamingEvent[]): void {
    this.ensureStarted(chunk, events);

    if (!this.text) {
      const block: TextBlock = { type: 'text', text: '' };
      this.text = { index: this.openBlock(block, events), block };
    }

    this.text.block.text += text;
    events.push({
      type: 'content_block_delta',
      index: this.text.index,
      delta: { type: 'text_delta', text }
    });
  }

  private resolveToolCall(id: string | undefined, slot: number): OpenToolCall | undefined {
    const bySlot = this.toolsBySlot.get(slot);
    if (id === undefined) {
      return bySlot;
    }

    const known = this.toolsById.get(id);
    if (known) {
      return known;
    }

    // A call first seen without an id adopts the id once it shows up
    if (bySlot && !bySlot.block.id) {
      bySlot.block.id = id;
      this.toolsById.set(id, bySlot);
      return bySlot;
    }

    return undefined;
  }

  private applyToolCall(
    chunk: Record<string, unknown>,
    entry: unknown,
    position: number,
    events: StreamingEvent[]
  ): void {
    if (!isObject(entry) || !isObject(entry.function)) return;

    const fn = entry.function;
    const id = asString(entry.id) || undefined;
    const slot = typeof entry.index === 'number' ? entry.index : position;
    const argumentsText = asString(fn.arguments) ?? '';

    let tool = this.resolveToolCall(id, slot);

    if (!tool) {
      this.ensureStarted(chunk, events);

      const block: ToolUseBlock = {
        type: 'tool_use',
        id: id ?? '',
        name: asString(fn.name) ?? '',
        input: parseToolArguments(argumentsText)
      };
      tool = { index: this.openBlock(block, events), block, argumentsBuffer: argumentsText };

      if (id !== undefined) this.toolsById.set(id, tool);
      this.toolsBySlot.set(slot, tool);
    } else {
      const name = asString(fn.name);
      if (name && !tool.block.name) tool.block.name = name;
      if (argumentsText) this.appendArguments(tool, argumentsText);
    }

    events.push({
      type: 'content_block_delta',
      index: tool.index,
      delta: { type: 'input_delta', input: structuredClone(tool.block.input) }
    });
  }

  /**
   * A payload that is a complete object on its own replaces the buffer
   * (whole-argument delivery); anything else is a fragment and is appended.
   * `input` only changes when the buffer parses.
   */
  private appendArguments(tool: OpenToolCall, argumentsText: string): void {
    const whole = tryParseJsonObject(argumentsText);
    if (whole) {
      tool.argumentsBuffer = argumentsText;
      tool.block.input = whole;
      return;
    }

    tool.argumentsBuffer += argumentsText;
    const assembled = tryParseJsonObject(tool.argumentsBuffer);
    if (assembled) {
      tool.block.input = assembled;
    }
  }

  private finish(chunk: Record<string, unknown>, finishReason: string, events: StreamingEvent[]): void {
    this.ensureStarted(chunk, events);

    for (let index = 0; index < this.message.content.length; index++) {
      events.push({ type: 'content_block_stop', index });
    }

    const stopReason = mapFinishReason(finishReason);
    this.message.stop_reason = stopReason;

    if (isObject(chunk.usage)) {
      const usage: Usage = {
        input_tokens: asCount(chunk.usage.prompt_tokens),
        output_tokens: asCount(chunk.usage.completion_tokens)
      };
      this.message.usage = usage;
    }

    events.push({
      type: 'message_delta',
      delta: { stop_reason: stopReason, stop_sequence: null },
      usage: this.message.usage ? { ...this.message.usage } : null
    });
    events.push({ type: 'message_stop' });

    this.complete = true;
    this.logger.debug('Stream completed', {
      id: this.message.id,
      model: this.message.model,
      blockCount: this.message.content.length,
      finishReason,
      stopReason,
      module: 'stream-transducer'
    });
  }
}

export function transduce(
  chunks: Iterable<unknown>,
  options: StreamTransducerOptions = {}
): Generator<StreamingEvent, void, undefined> {
  return new StreamTransducer(options).run(chunks);
}

export function transduceAsync(
  chunks: AsyncIterable<unknown> | Iterable<unknown>,
  options: StreamTransducerOptions = {}
): AsyncGenerator<StreamingEvent, void, undefined> {
  return new StreamTransducer(options).runAsync(chunks);
}
