import { ModelChange } from '../../core/entities/Model.js';
import { errorMessage } from '../../core/errors.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('model-watch');

export interface ModelIdSource {
  listModelIds(): Promise<string[]>;
}

export type ModelChangeListener = (change: ModelChange, notice: string) => void | Promise<void>;

/**
 * Last known model listing. Undefined until the first successful poll.
 */
export class ModelSnapshot {
  private ids: string[] | undefined;
  private updatedAt: Date | undefined;

  get(): string[] | undefined {
    return this.ids;
  }

  set(ids: string[]): void {
    this.ids = [...ids].sort();
    this.updatedAt = new Date();
  }

  getUpdatedAt(): Date | undefined {
    return this.updatedAt;
  }
}

export function diffModels(previous: string[], current: string[]): ModelChange {
  const before = new Set(previous);
  const after = new Set(current);
  return {
    added: current.filter((id) => !before.has(id)).sort(),
    removed: previous.filter((id) => !after.has(id)).sort(),
    current: [...current].sort(),
  };
}

export function formatModelChange(change: ModelChange): string {
  let message = 'Model change notice';
  if (change.added.length > 0) {
    message += `\n\n+ Added models:\n${change.added.join('\n')}`;
  }
  if (change.removed.length > 0) {
    message += `\n\n- Removed models:\n${change.removed.join('\n')}`;
  }
  return message;
}

/**
 * Polls the provider's model list and reports additions and removals
 */
export class ModelWatcher {
  private timer: NodeJS.Timeout | null = null;
  private polling = false;
  private listeners: ModelChangeListener[] = [];

  constructor(
    private source: ModelIdSource,
    private snapshot: ModelSnapshot = new ModelSnapshot()
  ) {}

  onChange(listener: ModelChangeListener): void {
    this.listeners.push(listener);
  }

  /**
   * One polling round. Returns the change, or null on first run, no change, overlap or failure.
   */
  async poll(): Promise<ModelChange | null> {
    if (this.polling) {
      return null;
    }
    this.polling = true;
    try {
      const current = await this.source.listModelIds();
      const previous = this.snapshot.get();

      if (previous === undefined) {
        this.snapshot.set(current);
        log.info('Model watch initialized', { models: current.length });
        return null;
      }

      const change = diffModels(previous, current);
      if (change.added.length === 0 && change.removed.length === 0) {
        return null;
      }

      this.snapshot.set(current);
      const notice = formatModelChange(change);
      log.info('Model list changed', { added: change.added.length, removed: change.removed.length });
      await this.notify(change, notice);
      return change;
    } catch (error) {
      log.error('Model watch poll failed', { error: errorMessage(error) });
      return null;
    } finally {
      this.polling = false;
    }
  }

  start(intervalMs: number): void {
    if (this.timer || intervalMs <= 0) {
      return;
    }
    this.timer = setInterval(() => {
      void this.poll();
    }, intervalMs);
    void this.poll();
    log.info('Model watch started', { intervalMs });
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      log.info('Model watch stopped');
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  getSnapshot(): ModelSnapshot {
    return this.snapshot;
  }

  private async notify(change: ModelChange, notice: string): Promise<void> {
    for (const listener of this.listeners) {
      try {
        await listener(change, notice);
      } catch (error) {
        log.error('Model change listener failed', { error: errorMessage(error) });
      }
    }
  }
}
