import { IChatCompletionClient } from '../../core/interfaces/IChatCompletionClient.js';
import { Turn } from '../../core/entities/Conversation.js';
import { CompletionResult } from '../../core/entities/Model.js';
import { ConfigurationMissingError, UpstreamStatusError } from '../../core/errors.js';
import { PromptLoader } from './PromptLoader.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('completion');

export const COMPLETION_TEMPERATURE = 0.7;
export const MAX_LOGGED_BODY_LENGTH = 1000;

export const MISSING_API_KEY_NOTICE = 'OPENAI_API_KEY is not configured.';
export const TRANSPORT_FAILURE_NOTICE = 'Request to the completion service failed, please try again later.';

export function upstreamErrorNotice(status: number): string {
  return `Upstream returned error ${status}, please try again later.`;
}

export function truncateBody(body: string, maxLength: number = MAX_LOGGED_BODY_LENGTH): string {
  return body.length > maxLength ? `${body.slice(0, maxLength)}...` : body;
}

/**
 * `[system?] + history + [newTurn]`
 */
export function buildMessages(systemTurn: Turn | undefined, history: Turn[], newTurn: Turn): Turn[] {
  const messages: Turn[] = [];
  if (systemTurn) {
    messages.push(systemTurn);
  }
  messages.push(...history, newTurn);
  return messages;
}

/**
 * Service that turns a conversation into one completion call.
 * Every failure becomes a notice result; this never throws.
 */
export class CompletionService {
  constructor(
    private client: IChatCompletionClient,
    private promptLoader: PromptLoader
  ) {}

  async complete(history: Turn[], newTurn: Turn, model: string): Promise<CompletionResult> {
    if (!this.client.isConfigured()) {
      return { kind: 'notice', reason: 'configuration-missing', text: MISSING_API_KEY_NOTICE };
    }

    const systemTurn = await this.promptLoader.loadSystemPrompt();
    const messages = buildMessages(systemTurn, history, newTurn);

    try {
      const content = await this.client.createChatCompletion({
        model,
        messages,
        temperature: COMPLETION_TEMPERATURE,
      });
      const text = content.trim();
      return text ? { kind: 'reply', text } : { kind: 'empty', text: '' };
    } catch (error) {
      return this.classifyFailure(error, model);
    }
  }

  private classifyFailure(error: unknown, model: string): CompletionResult {
    if (error instanceof ConfigurationMissingError) {
      return { kind: 'notice', reason: 'configuration-missing', text: MISSING_API_KEY_NOTICE };
    }

    if (error instanceof UpstreamStatusError) {
      log.error('Completion request failed', {
        model,
        status: error.status,
        statusText: error.statusText,
        body: truncateBody(error.body),
      });
      return {
        kind: 'notice',
        reason: 'upstream-status',
        status: error.status,
        text: upstreamErrorNotice(error.status),
      };
    }

    log.error('Completion request failed', {
      model,
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    return { kind: 'notice', reason: 'transport', text: TRANSPORT_FAILURE_NOTICE };
  }
}
