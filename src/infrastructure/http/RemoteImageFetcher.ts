import { FetchedImage, IImageFetcher } from '../../core/interfaces/IImageFetcher.js';
import { HttpResponse, IHttpClient } from '../../core/interfaces/IHttpClient.js';
import { TransportError, UpstreamStatusError, errorMessage } from '../../core/errors.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('image-fetch');

export const IMAGE_FETCH_TIMEOUT_MS = 10_000;

/**
 * Fetches image bytes over the shared HTTP client and base64-encodes them
 */
export class RemoteImageFetcher implements IImageFetcher {
  constructor(private httpClient: IHttpClient) {}

  async fetchImage(url: string): Promise<FetchedImage> {
    const response = await this.httpClient.request(url, {
      method: 'GET',
      timeoutMs: IMAGE_FETCH_TIMEOUT_MS,
    });

    if (!response.ok) {
      // The body must be consumed or the keep-alive socket never returns to the pool
      throw new UpstreamStatusError(response.status, response.statusText, await drainBody(response));
    }

    let bytes: ArrayBuffer;
    try {
      bytes = await response.arrayBuffer();
    } catch (error) {
      throw new TransportError('Failed to read image body', error);
    }

    const contentType = (response.headers.get('content-type') ?? '').split(';', 1)[0].trim();
    return {
      base64: Buffer.from(bytes).toString('base64'),
      contentType: contentType || undefined,
    };
  }
}

async function drainBody(response: HttpResponse): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    log.debug('Failed to read error body', { status: response.status, error: errorMessage(error) });
    return '';
  }
}
