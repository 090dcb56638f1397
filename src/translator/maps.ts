import type { FinishReason, StopReason } from '../types/index.js';

/**
 * Upstream finish reason → Messages stop reason
 */
export const finishReasonToStopReason: Record<FinishReason, StopReason> = {
  'stop': 'end_turn',
  'length': 'max_tokens',
  'tool_calls': 'tool_use',
  'function_call': 'tool_use',
  'content_filter': 'end_turn'
};

/**
 * Messages stop reason → upstream finish reason
 */
export const stopReasonToFinishReason: Record<StopReason, FinishReason> = {
  'end_turn': 'stop',
  'max_tokens': 'length',
  'stop_sequence': 'stop',
  'tool_use': 'tool_calls'
};

function isFinishReason(value: string): value is FinishReason {
  return Object.prototype.hasOwnProperty.call(finishReasonToStopReason, value);
}

function isStopReason(value: string): value is StopReason {
  return Object.prototype.hasOwnProperty.call(stopReasonToFinishReason, value);
}

/**
 * Unknown finish reasons collapse to `end_turn`.
 */
export function mapFinishReason(finishReason: string): StopReason {
  return isFinishReason(finishReason) ? finishReasonToStopReason[finishReason] : 'end_turn';
}

/**
 * Unknown stop reasons collapse to `stop`.
 */
export function mapStopReason(stopReason: string): FinishReason {
  return isStopReason(stopReason) ? stopReasonToFinishReason[stopReason] : 'stop';
}
