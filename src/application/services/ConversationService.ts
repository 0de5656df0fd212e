import { IDocumentStore } from '../../core/interfaces/IDocumentStore.js';
import { MAX_CONTEXT_MESSAGES, Turn, TurnSchema, hasContent } from '../../core/entities/Conversation.js';
import { errorMessage } from '../../core/errors.js';
import { KeyedLock } from '../../utils/KeyedLock.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('conversation');

/**
 * Keep only the most recent `maxMessages` turns, oldest dropped first
 */
export function trimHistory(turns: Turn[], maxMessages: number = MAX_CONTEXT_MESSAGES): Turn[] {
  return turns.length > maxMessages ? turns.slice(-maxMessages) : turns;
}

/**
 * Validate a stored history document; unknown entries are dropped
 */
export function parseHistoryDocument(document: unknown, sessionKey: string): Turn[] {
  if (document === undefined) {
    return [];
  }
  if (!Array.isArray(document)) {
    log.warn('Invalid context format, starting fresh', { sessionKey });
    return [];
  }

  const turns: Turn[] = [];
  let dropped = 0;
  for (const entry of document) {
    const parsed = TurnSchema.safeParse(entry);
    if (parsed.success) {
      turns.push(parsed.data);
    } else {
      dropped++;
    }
  }
  if (dropped > 0) {
    log.warn('Dropped malformed turns from stored context', { sessionKey, dropped });
  }
  return turns;
}

/**
 * Owns per-session conversation history (the rolling context window)
 */
export class ConversationService {
  private locks = new KeyedLock();

  constructor(
    private store: IDocumentStore,
    private maxMessages: number = MAX_CONTEXT_MESSAGES
  ) {}

  /**
   * Run a load-modify-save sequence without interleaving other tasks on the same session
   */
  withSession<T>(sessionKey: string, task: () => Promise<T>): Promise<T> {
    return this.locks.run(sessionKey, task);
  }

  async loadHistory(sessionKey: string): Promise<Turn[]> {
    const document = await this.store.load(sessionKey);
    return parseHistoryDocument(document, sessionKey);
  }

  /**
   * Append the user/assistant pair, trim to the window and persist.
   * Returns false without touching storage when the assistant turn is empty.
   */
  async appendAndTrim(
    sessionKey: string,
    history: Turn[],
    userTurn: Turn,
    assistantTurn: Turn
  ): Promise<boolean> {
    if (!hasContent(assistantTurn)) {
      return false;
    }

    const updated = trimHistory([...history, userTurn, assistantTurn], this.maxMessages);
    try {
      await this.store.save(sessionKey, updated);
      return true;
    } catch (error) {
      log.error('Failed to save context', { sessionKey, error: errorMessage(error) });
      return false;
    }
  }

  async clearHistory(sessionKey: string): Promise<void> {
    await this.withSession(sessionKey, () => this.store.delete(sessionKey));
  }

  getMaxMessages(): number {
    return this.maxMessages;
  }
}
