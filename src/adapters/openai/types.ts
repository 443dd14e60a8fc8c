import type { InputSchema } from '../../gateway/json-schema';

/**
 * OpenAI function definition.
 * @see https://platform.openai.com/docs/api-reference/chat/create#chat-create-tools
 */
export interface OpenAIFunction {
  name: string;
  description: string;
  /** JSON Schema of the arguments object. */
  parameters: InputSchema;
  /**
   * Strict mode needs every property required and rejects `anyOf` unions, which the filter
   * arguments use, so it stays off.
   */
  strict?: boolean;
}

/** Tool definition for the Chat Completions API. */
export interface OpenAITool {
  type: 'function';
  function: OpenAIFunction;
}
