export { BridgeClient, type BridgeClientOptions, type PostOptions, type UpstreamCall } from './bridge-client.js';
export { Messages, CHAT_COMPLETIONS_PATH, type RequestOptions } from './messages.js';
export { MessageStream } from './message-stream.js';
export { createFetchTransport, type Transport, type TransportRequest, type TransportResponse } from './transport.js';
