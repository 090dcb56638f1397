export * from './json.types.js';
export * from './request.types.js';
export * from './response.types.js';
export * from './streaming-response.types.js';
export * from './chat-completion.types.js';
