import fetch from 'node-fetch';
import http from 'http';
import https from 'https';
import { HttpRequestOptions, HttpResponse, IHttpClient } from '../../core/interfaces/IHttpClient.js';
import { TransportError, errorMessage } from '../../core/errors.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('http');

interface AgentPair {
  http: http.Agent;
  https: https.Agent;
}

/**
 * Process-wide HTTP client.
 *
 * Owns one keep-alive agent per protocol so completion, model-list and image
 * requests share pooled connections. Agents are created on `start()` or on the
 * first request, and destroyed by `close()`.
 */
export class HttpClient implements IHttpClient {
  private agents: AgentPair | null = null;
  private closed = false;

  constructor(private maxSockets: number = 16) {}

  start(): void {
    if (this.closed) {
      throw new Error('HttpClient has been closed');
    }
    if (!this.agents) {
      this.agents = {
        http: new http.Agent({ keepAlive: true, maxSockets: this.maxSockets }),
        https: new https.Agent({ keepAlive: true, maxSockets: this.maxSockets }),
      };
      log.debug('HTTP agents initialized', { maxSockets: this.maxSockets });
    }
  }

  isStarted(): boolean {
    return this.agents !== null;
  }

  async request(url: string, options: HttpRequestOptions): Promise<HttpResponse> {
    this.start();
    const agents = this.agents;
    if (!agents) {
      throw new Error('HttpClient agents unavailable');
    }

    try {
      return await fetch(url, {
        method: options.method ?? 'GET',
        headers: options.headers,
        body: options.body,
        timeout: options.timeoutMs,
        agent: (parsedUrl: URL) => (parsedUrl.protocol === 'http:' ? agents.http : agents.https),
      });
    } catch (error) {
      const safeUrl = describeUrl(url);
      const detail = errorMessage(error).split(url).join(safeUrl);
      throw new TransportError(`Request to ${safeUrl} failed: ${detail}`, error);
    }
  }

  async close(): Promise<void> {
    if (this.agents) {
      this.agents.http.destroy();
      this.agents.https.destroy();
      this.agents = null;
      log.debug('HTTP agents closed');
    }
    this.closed = true;
  }
}

/**
 * Origin and path only; query strings may carry signed tokens
 */
function describeUrl(url: string): string {
  try {
    const parsed = new URL(url);
    return `${parsed.origin}${parsed.pathname}`;
  } catch {
    return 'invalid URL';
  }
}
