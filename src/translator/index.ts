export { mapRequest, type MapperOptions } from './request.js';
export { mapResponse, generateMessageId, UNKNOWN_MODEL } from './response.js';
export { mapFinishReason, mapStopReason, finishReasonToStopReason, stopReasonToFinishReason } from './maps.js';
export { toChatMessages, convertContentBlocks, stringifyToolResultContent } from './messages.js';
export { toChatTools, toChatToolChoice } from './tools.js';
export { StreamTransducer, transduce, transduceAsync, type StreamTransducerOptions } from './streaming.js';
export { streamEvents, streamEventsAsync, type StreamEventsOptions } from './stream-pipeline.js';
