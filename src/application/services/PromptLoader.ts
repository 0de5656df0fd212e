import { promises as fs } from 'fs';
import path from 'path';
import { Turn } from '../../core/entities/Conversation.js';
import { errorMessage } from '../../core/errors.js';
import { isNotFound } from '../../utils/fsErrors.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('prompt');

/**
 * Loads the optional system instruction from disk.
 * The file is re-read on every call so edits apply without a restart.
 */
export class PromptLoader {
  constructor(
    private promptFile: string | undefined,
    private cwd: string = process.cwd()
  ) {}

  resolvePath(): string | undefined {
    if (!this.promptFile) {
      return undefined;
    }
    return path.isAbsolute(this.promptFile) ? this.promptFile : path.join(this.cwd, this.promptFile);
  }

  async loadSystemPrompt(): Promise<Turn | undefined> {
    const filePath = this.resolvePath();
    if (!filePath) {
      return undefined;
    }

    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        log.warn('Prompt file not found', { filePath });
      } else {
        log.error('Failed to load prompt file', { filePath, error: errorMessage(error) });
      }
      return undefined;
    }

    const trimmed = content.trim();
    if (!trimmed) {
      return undefined;
    }
    return { role: 'system', content: trimmed };
  }
}
