import { IChatCompletionClient } from '../../core/interfaces/IChatCompletionClient.js';
import { ModelCapability, ModelEntry } from '../../core/entities/Model.js';

/**
 * Coarse capability tags guessed from a model identifier
 */
export function inferCapabilities(modelId: string): ModelCapability[] {
  const lowered = modelId.toLowerCase();
  const capabilities: ModelCapability[] = ['text'];
  if (lowered.includes('vision') || lowered.includes('gpt-4o')) {
    capabilities.push('vision');
  }
  if (lowered.startsWith('o1') || lowered.includes('reason')) {
    capabilities.push('reasoning');
  }
  return capabilities;
}

/**
 * Lists provider models. Capabilities are re-derived on every call.
 */
export class ModelDirectory {
  constructor(private client: IChatCompletionClient) {}

  /**
   * Transport and upstream errors propagate; a missing key or unexpected shape yields []
   */
  async listModels(): Promise<ModelEntry[]> {
    if (!this.client.isConfigured()) {
      return [];
    }

    const items = await this.client.listModels();
    const ids = new Set<string>();
    for (const item of items) {
      if (typeof item === 'object' && item !== null && 'id' in item && typeof item.id === 'string' && item.id) {
        ids.add(item.id);
      }
    }

    return [...ids]
      .sort()
      .map((id) => ({ id, capabilities: inferCapabilities(id) }));
  }

  async listModelIds(): Promise<string[]> {
    const models = await this.listModels();
    return models.map((model) => model.id);
  }
}

export function formatModelEntry(entry: ModelEntry): string {
  return `${entry.id}\nCapabilities: ${entry.capabilities.join(', ')}`;
}
