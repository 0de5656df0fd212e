import { ContentPart, ImagePart, Turn } from '../../core/entities/Conversation.js';
import { ImageSegmentData, MessageSegment } from '../../core/entities/InboundMessage.js';
import { IImageFetcher } from '../../core/interfaces/IImageFetcher.js';
import { errorMessage } from '../../core/errors.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('assembler');

const BASE64_FILE_PREFIX = 'base64://';

/**
 * Guess an image MIME type from a file name or URL path
 */
export function inferImageMime(fileValue: string): string {
  const lowered = stripQueryAndFragment(fileValue).toLowerCase();
  if (lowered.endsWith('.jpg') || lowered.endsWith('.jpeg')) {
    return 'image/jpeg';
  }
  if (lowered.endsWith('.gif')) {
    return 'image/gif';
  }
  if (lowered.endsWith('.webp')) {
    return 'image/webp';
  }
  return 'image/png';
}

/**
 * Wrap a base64 payload in a data URI; payloads that already are image data URIs pass through
 */
export function normalizeImageDataUrl(fileValue: string, base64Value: string, mime?: string): string {
  if (base64Value.startsWith('data:image/')) {
    return base64Value;
  }
  const mimeValue = mime || inferImageMime(fileValue);
  return `data:${mimeValue};base64,${base64Value}`;
}

/**
 * Converts an inbound message into a single user turn the completion API accepts
 */
export class MessageAssembler {
  constructor(private imageFetcher: IImageFetcher) {}

  async buildUserTurn(segments: MessageSegment[]): Promise<Turn | undefined> {
    const parts: ContentPart[] = [];
    let textBuffer: string[] = [];

    const flushText = () => {
      if (textBuffer.length === 0) {
        return;
      }
      const text = textBuffer.join('').trim();
      textBuffer = [];
      if (text) {
        parts.push({ type: 'text', text });
      }
    };

    for (const segment of segments) {
      if (segment.type === 'text') {
        textBuffer.push(segment.data.text);
        continue;
      }
      if (segment.type !== 'image') {
        continue;
      }
      flushText();
      const imagePart = await this.buildImagePart(segment.data);
      if (imagePart) {
        parts.push(imagePart);
      }
    }

    flushText();

    if (parts.length === 0) {
      return undefined;
    }
    // A lone text part collapses to a plain string; some providers reject the part-array form
    const [first] = parts;
    if (parts.length === 1 && first.type === 'text') {
      return { role: 'user', content: first.text };
    }
    return { role: 'user', content: parts };
  }

  async buildImagePart(data: ImageSegmentData): Promise<ImagePart | undefined> {
    const fileValue = data.file ?? '';
    let base64Value = data.base64 ?? '';

    if (!base64Value && fileValue.startsWith(BASE64_FILE_PREFIX)) {
      base64Value = fileValue.slice(BASE64_FILE_PREFIX.length);
    }

    if (base64Value) {
      return imagePart(normalizeImageDataUrl(fileValue, base64Value, data.mime));
    }

    const urlValue = data.url ?? '';
    if (!urlValue) {
      return undefined;
    }

    try {
      const fetched = await this.imageFetcher.fetchImage(urlValue);
      if (!fetched.base64) {
        log.warn('Fetched image is empty', { url: urlValue });
        return undefined;
      }
      return imagePart(normalizeImageDataUrl(urlValue, fetched.base64, fetched.contentType ?? data.mime));
    } catch (error) {
      log.warn('Failed to fetch image url', { url: urlValue, error: errorMessage(error) });
      return undefined;
    }
  }
}

function imagePart(url: string): ImagePart {
  return { type: 'image_url', image_url: { url } };
}

function stripQueryAndFragment(value: string): string {
  if (value.startsWith('data:')) {
    return value;
  }
  const cut = value.search(/[?#]/);
  return cut === -1 ? value : value.slice(0, cut);
}
