import type { ChatTool, ChatToolChoice, ToolChoiceParam, ToolDefinition } from '../types/index.js';
import { isObject } from './core/json.js';

/**
 * Convert Messages tool definitions to ChatCompletion function tools
 */
export function toChatTools(tools: ToolDefinition[]): ChatTool[] {
  return tools.map(tool => ({
    type: 'function' as const,
    function: {
      name: tool.name || '',
      description: tool.description || '',
      parameters: tool.input_schema ?? {}
    }
  }));
}

/**
 * Convert Messages tool_choice to ChatCompletion tool_choice.
 *
 * `'auto'` stays auto, `'any'`/`'required'` force a call, `{type: 'tool', name}`
 * pins one function. Anything else falls back to `'auto'`.
 */
export function toChatToolChoice(toolChoice: ToolChoiceParam): ChatToolChoice {
  if (typeof toolChoice === 'string') {
    switch (toolChoice) {
      case 'any':
      case 'required':
        return 'required';
      default:
        return 'auto';
    }
  }

  if (isObject(toolChoice) && toolChoice.type === 'tool' && typeof toolChoice.name === 'string' && toolChoice.name) {
    return {
      type: 'function',
      function: { name: toolChoice.name }
    };
  }

  return 'auto';
}
