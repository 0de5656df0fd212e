import { IDocumentStore } from '../../core/interfaces/IDocumentStore.js';
import { UserSettings, UserSettingsSchema } from '../../core/entities/Conversation.js';
import { errorMessage } from '../../core/errors.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('settings');

/**
 * Per-user preferences, keyed by sender id in a store of their own.
 * Documents are created on first write.
 */
export class UserSettingsService {
  constructor(
    private store: IDocumentStore,
    private defaultModel: string
  ) {}

  async loadSettings(senderId: string): Promise<UserSettings> {
    const document = await this.store.load(senderId);
    if (document === undefined) {
      return {};
    }
    const parsed = UserSettingsSchema.safeParse(document);
    if (!parsed.success) {
      log.warn('Invalid user settings format', { senderId });
      return {};
    }
    return parsed.data;
  }

  async getModel(senderId: string): Promise<string> {
    const settings = await this.loadSettings(senderId);
    return settings.model ? settings.model : this.defaultModel;
  }

  /**
   * Returns whether the preference was persisted
   */
  async setModel(senderId: string, model: string): Promise<boolean> {
    const settings = await this.loadSettings(senderId);
    try {
      await this.store.save(senderId, { ...settings, model });
      return true;
    } catch (error) {
      log.error('Failed to save user settings', { senderId, error: errorMessage(error) });
      return false;
    }
  }

  getDefaultModel(): string {
    return this.defaultModel;
  }
}
