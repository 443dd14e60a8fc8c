import type { Gateway } from '../../gateway/create-gateway';
import type { OperationDescription } from '../../gateway/types';
import type { OpenAITool } from './types';

export type { OpenAIFunction, OpenAITool } from './types';

/**
 * Renders the gateway's operations as OpenAI Chat Completions tools.
 *
 * @example
 * ```ts
 * const response = await openai.chat.completions.create({
 *   model,
 *   messages,
 *   tools: toOpenAI(gateway),
 * });
 * ```
 */
export function toOpenAI(gateway: Pick<Gateway, 'describe'>): OpenAITool[] {
  return gateway.describe().map(convertToOpenAI);
}

function convertToOpenAI(operation: OperationDescription): OpenAITool {
  return {
    type: 'function',
    function: {
      name: operation.name,
      description: operation.description,
      parameters: operation.inputSchema,
      strict: false,
    },
  };
}
