import { ChatCompletionRequest } from '../entities/Model.js';

/**
 * Interface for an OpenAI-compatible completion API
 */
export interface IChatCompletionClient {
  /**
   * Send a chat completion and return the first choice's message content (untrimmed)
   */
  createChatCompletion(request: ChatCompletionRequest): Promise<string>;

  /**
   * Raw `data` array of the model listing, or an empty array when the shape is unexpected
   */
  listModels(): Promise<unknown[]>;

  isConfigured(): boolean;
}
