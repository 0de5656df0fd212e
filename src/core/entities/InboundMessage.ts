import { z } from 'zod';

/**
 * Inbound message as delivered by the messaging front-end (OneBot-style segments)
 */
export interface TextSegment {
  type: 'text';
  data: { text: string };
}

export interface ImageSegmentData {
  file?: string;
  base64?: string;
  url?: string;
  mime?: string;
}

export interface ImageSegment {
  type: 'image';
  data: ImageSegmentData;
}

/**
 * Any segment kind the relay does not understand (faces, mentions, replies...)
 */
export interface UnsupportedSegment {
  type: 'unsupported';
  data: { originalType: string };
}

export type MessageSegment = TextSegment | ImageSegment | UnsupportedSegment;

export interface InboundMessage {
  senderId: string;
  groupId?: string;
  segments: MessageSegment[];
}

const TextSegmentDataSchema = z.object({ text: z.string().default('') });

const ImageSegmentDataSchema = z.object({
  file: z.string().optional(),
  base64: z.string().optional(),
  url: z.string().optional(),
  mime: z.string().optional(),
});

const RawSegmentSchema = z.object({
  type: z.string().min(1),
  data: z.record(z.unknown()).default({}),
});

function reportDataIssues(error: z.ZodError, ctx: z.RefinementCtx): void {
  for (const issue of error.issues) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: issue.message,
      path: ['data', ...issue.path],
    });
  }
}

export const MessageSegmentSchema: z.ZodType<MessageSegment, z.ZodTypeDef, unknown> =
  RawSegmentSchema.transform((raw, ctx): MessageSegment => {
    if (raw.type === 'text') {
      const parsed = TextSegmentDataSchema.safeParse(raw.data);
      if (!parsed.success) {
        reportDataIssues(parsed.error, ctx);
        return z.NEVER;
      }
      return { type: 'text', data: parsed.data };
    }
    if (raw.type === 'image') {
      const parsed = ImageSegmentDataSchema.safeParse(raw.data);
      if (!parsed.success) {
        reportDataIssues(parsed.error, ctx);
        return z.NEVER;
      }
      return { type: 'image', data: parsed.data };
    }
    return { type: 'unsupported', data: { originalType: raw.type } };
  });

export const InboundMessageSchema: z.ZodType<InboundMessage, z.ZodTypeDef, unknown> = z.object({
  senderId: z.union([z.string().min(1), z.number().int()]).transform(String),
  groupId: z
    .union([z.string(), z.number().int()])
    .optional()
    .nullable()
    .transform((value) => (value === undefined || value === null || value === '' ? undefined : String(value))),
  segments: z.array(MessageSegmentSchema),
});

/**
 * Concatenate all text segments (no trimming)
 */
export function extractPlainText(segments: MessageSegment[]): string {
  return segments
    .map((segment) => (segment.type === 'text' ? segment.data.text : ''))
    .join('');
}
