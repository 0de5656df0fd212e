import { Turn } from './Conversation.js';

/**
 * Model-related domain entities
 */
export type ModelCapability = 'text' | 'vision' | 'reasoning';

export interface ModelEntry {
  id: string;
  capabilities: ModelCapability[];
}

export interface ChatCompletionRequest {
  model: string;
  messages: Turn[];
  temperature: number;
}

export type NoticeReason = 'configuration-missing' | 'upstream-status' | 'transport';

export type CompletionResult =
  | { kind: 'reply'; text: string }
  | { kind: 'empty'; text: '' }
  | { kind: 'notice'; reason: NoticeReason; text: string; status?: number };

export interface ModelChange {
  added: string[];
  removed: string[];
  current: string[];
}
