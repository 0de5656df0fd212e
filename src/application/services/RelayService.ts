import { InboundMessage, MessageSegment, extractPlainText } from '../../core/entities/InboundMessage.js';
import { CompletionResult } from '../../core/entities/Model.js';
import { resolveSession } from '../../core/session/SessionKeys.js';
import { errorMessage } from '../../core/errors.js';
import { MessageAssembler } from './MessageAssembler.js';
import { ConversationService } from './ConversationService.js';
import { CompletionService } from './CompletionService.js';
import { ModelDirectory, formatModelEntry } from './ModelDirectory.js';
import { UserSettingsService } from './UserSettingsService.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('relay');

export const CHAT_USAGE_NOTICE = 'Please provide content. Usage: /chat hello';
export const NO_MODELS_NOTICE = 'No models available.';
export const MODEL_LIST_FAILURE_NOTICE = 'Failed to fetch the model list, please try again later.';
export const MODEL_SAVE_FAILURE_NOTICE = 'Failed to save the model preference, please try again later.';

export type CommandName = 'model' | 'chat';

export interface ParsedCommand {
  name: CommandName;
  args: MessageSegment[];
}

export type RelayOutcome =
  | { kind: 'ignored' }
  | {
      kind: 'completion';
      sessionKey: string;
      model: string;
      result: CompletionResult;
      persisted: boolean;
    }
  | {
      kind: 'command';
      command: 'model-list' | 'model-set' | 'chat-usage';
      text: string;
    };

const COMMAND_PATTERN = /^\s*\/(model|chat)(?=\s|$)/;

/**
 * Detects a leading `/model` or `/chat` and returns the remaining segments with the prefix removed
 */
export function parseCommand(segments: MessageSegment[]): ParsedCommand | undefined {
  const index = segments.findIndex((segment) => segment.type !== 'unsupported');
  if (index === -1) {
    return undefined;
  }
  const head = segments[index];
  if (head.type !== 'text') {
    return undefined;
  }

  const match = COMMAND_PATTERN.exec(head.data.text);
  if (!match) {
    return undefined;
  }

  const name: CommandName = match[1] === 'model' ? 'model' : 'chat';
  const remainder = head.data.text.slice(match[0].length).trimStart();
  const args: MessageSegment[] = [...segments.slice(index + 1)];
  if (remainder) {
    args.unshift({ type: 'text', data: { text: remainder } });
  }
  return { name, args };
}

/**
 * Text to send back to the front-end, or null when nothing should be sent
 */
export function replyText(outcome: RelayOutcome): string | null {
  switch (outcome.kind) {
    case 'ignored':
      return null;
    case 'command':
      return outcome.text;
    case 'completion':
      return outcome.result.text || null;
  }
}

/**
 * Entry point for inbound messages: commands, then the chat flow
 * (resolve session → load history → assemble turn → complete → persist).
 */
export class RelayService {
  constructor(
    private assembler: MessageAssembler,
    private conversations: ConversationService,
    private completion: CompletionService,
    private settings: UserSettingsService,
    private models: ModelDirectory
  ) {}

  async handleMessage(message: InboundMessage): Promise<RelayOutcome> {
    const command = parseCommand(message.segments);

    if (command?.name === 'model') {
      return this.handleModelCommand(message.senderId, command.args);
    }

    const segments = command ? command.args : message.segments;
    const userTurn = await this.assembler.buildUserTurn(segments);
    if (!userTurn) {
      return command
        ? { kind: 'command', command: 'chat-usage', text: CHAT_USAGE_NOTICE }
        : { kind: 'ignored' };
    }

    const sessionKey = resolveSession(message.senderId, message.groupId);

    return this.conversations.withSession(sessionKey, async () => {
      const history = await this.conversations.loadHistory(sessionKey);
      const model = await this.settings.getModel(message.senderId);
      const result = await this.completion.complete(history, userTurn, model);

      let persisted = false;
      if (result.kind === 'reply') {
        persisted = await this.conversations.appendAndTrim(sessionKey, history, userTurn, {
          role: 'assistant',
          content: result.text,
        });
      }

      log.info('Handled chat message', {
        sessionKey,
        model,
        result: result.kind,
        historyLength: history.length,
        persisted,
      });
      return { kind: 'completion', sessionKey, model, result, persisted };
    });
  }

  private async handleModelCommand(senderId: string, args: MessageSegment[]): Promise<RelayOutcome> {
    const requested = extractPlainText(args).trim();

    if (requested) {
      const saved = await this.settings.setModel(senderId, requested);
      return {
        kind: 'command',
        command: 'model-set',
        text: saved ? `Switched to model: ${requested}` : MODEL_SAVE_FAILURE_NOTICE,
      };
    }

    return { kind: 'command', command: 'model-list', text: await this.describeModels() };
  }

  private async describeModels(): Promise<string> {
    try {
      const entries = await this.models.listModels();
      if (entries.length === 0) {
        return NO_MODELS_NOTICE;
      }
      return entries.map(formatModelEntry).join('\n\n');
    } catch (error) {
      log.error('Fetch models failed', { error: errorMessage(error) });
      return MODEL_LIST_FAILURE_NOTICE;
    }
  }
}
