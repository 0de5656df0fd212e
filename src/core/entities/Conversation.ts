import { z } from 'zod';

/**
 * Conversation domain entities
 */
export const MAX_CONTEXT_MESSAGES = 20;

export type TurnRole = 'system' | 'user' | 'assistant';

export interface TextPart {
  type: 'text';
  text: string;
}

export interface ImagePart {
  type: 'image_url';
  image_url: { url: string };
}

export type ContentPart = TextPart | ImagePart;

/**
 * Plain text, or an ordered list of parts for multimodal turns
 */
export type TurnContent = string | ContentPart[];

export interface Turn {
  role: TurnRole;
  content: TurnContent;
}

export interface UserSettings {
  model?: string;
}

export const TextPartSchema: z.ZodType<TextPart> = z.object({
  type: z.literal('text'),
  text: z.string().min(1),
});

// Persisted images are always embedded; a remote URL here means the document was not written by us
export const ImagePartSchema: z.ZodType<ImagePart> = z.object({
  type: z.literal('image_url'),
  image_url: z.object({
    url: z.string().startsWith('data:'),
  }),
});

export const ContentPartSchema: z.ZodType<ContentPart> = z.union([TextPartSchema, ImagePartSchema]);

export const TurnSchema: z.ZodType<Turn> = z.object({
  role: z.enum(['system', 'user', 'assistant']),
  content: z.union([z.string().min(1), z.array(ContentPartSchema).min(1)]),
});

// An unusable `model` is dropped on its own; other stored fields pass through untouched
export const UserSettingsSchema: z.ZodType<UserSettings, z.ZodTypeDef, unknown> = z
  .object({
    model: z.string().optional().catch(undefined),
  })
  .passthrough();

export function textTurn(role: TurnRole, text: string): Turn {
  return { role, content: text };
}

export function hasContent(turn: Turn): boolean {
  return turn.content.length > 0;
}
