import express, { Express, NextFunction, Request, Response } from 'express';
import { Server as HttpServer } from 'http';
import { WebSocketServer, WebSocket } from 'ws';
import cors from 'cors';
import { z } from 'zod';
import { InboundMessageSchema } from '../../core/entities/InboundMessage.js';
import { errorMessage } from '../../core/errors.js';
import type { RelayService } from '../../application/services/RelayService.js';
import { replyText } from '../../application/services/RelayService.js';
import type { ConversationService } from '../../application/services/ConversationService.js';
import type { UserSettingsService } from '../../application/services/UserSettingsService.js';
import type { ModelDirectory } from '../../application/services/ModelDirectory.js';
import type { ModelWatcher } from '../../application/services/ModelWatcher.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('web');

const SetModelSchema = z.object({
  model: z.string().trim().min(1, 'model must not be empty'),
});

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/**
 * Express 4 does not await handlers; forward rejections to the error middleware
 */
function route(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

export interface WebServerDeps {
  relay: RelayService;
  conversations: ConversationService;
  settings: UserSettingsService;
  models: ModelDirectory;
  watcher?: ModelWatcher;
}

export type BroadcastEvent =
  | {
      type: 'models_changed';
      groupId?: string;
      added: string[];
      removed: string[];
      text: string;
    }
  | { type: 'conversation_cleared'; sessionKey: string };

/**
 * HTTP + WebSocket surface the messaging front-end adapter talks to
 */
export class WebServer {
  private app: Express;
  private httpServer: HttpServer | null = null;
  private wss: WebSocketServer | null = null;
  private clients: Set<WebSocket> = new Set();

  constructor(private deps: WebServerDeps) {
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  getApp(): Express {
    return this.app;
  }

  private setupMiddleware(): void {
    this.app.use(cors());
    // Inline base64 images make bodies large
    this.app.use(express.json({ limit: '20mb' }));
  }

  private setupRoutes(): void {
    // API: Relay an inbound message and return the reply text
    this.app.post('/api/messages', route(async (req: Request, res: Response) => {
      const parsed = InboundMessageSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ success: false, error: formatIssues(parsed.error) });
        return;
      }

      try {
        const outcome = await this.deps.relay.handleMessage(parsed.data);
        res.json({ success: true, data: { reply: replyText(outcome), outcome } });
      } catch (error) {
        log.error('Relay failed', { error: errorMessage(error) });
        res.status(500).json({ success: false, error: errorMessage(error) });
      }
    }));

    // API: List provider models
    this.app.get('/api/models', route(async (req: Request, res: Response) => {
      try {
        const models = await this.deps.models.listModels();
        res.json({ success: true, data: models });
      } catch (error) {
        log.error('Fetch models failed', { error: errorMessage(error) });
        res.status(502).json({ success: false, error: errorMessage(error) });
      }
    }));

    // API: Get user settings
    this.app.get('/api/users/:userId/settings', route(async (req: Request, res: Response) => {
      const { userId } = req.params;
      const settings = await this.deps.settings.loadSettings(userId);
      const model = await this.deps.settings.getModel(userId);
      res.json({ success: true, data: { ...settings, effectiveModel: model } });
    }));

    // API: Set user model preference
    this.app.put('/api/users/:userId/model', route(async (req: Request, res: Response) => {
      const parsed = SetModelSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ success: false, error: formatIssues(parsed.error) });
        return;
      }
      const saved = await this.deps.settings.setModel(req.params.userId, parsed.data.model);
      if (!saved) {
        res.status(500).json({ success: false, error: 'Failed to save user settings' });
        return;
      }
      res.json({ success: true, data: { model: parsed.data.model } });
    }));

    // API: Get stored conversation history
    this.app.get('/api/sessions/:sessionKey/history', route(async (req: Request, res: Response) => {
      const history = await this.deps.conversations.loadHistory(req.params.sessionKey);
      res.json({ success: true, data: history });
    }));

    // API: Clear conversation history
    this.app.delete('/api/sessions/:sessionKey', route(async (req: Request, res: Response) => {
      const { sessionKey } = req.params;
      await this.deps.conversations.clearHistory(sessionKey);
      this.broadcast({ type: 'conversation_cleared', sessionKey });
      res.json({ success: true, message: 'Conversation cleared' });
    }));

    // API: Health
    this.app.get('/api/health', (req: Request, res: Response) => {
      const snapshot = this.deps.watcher?.getSnapshot();
      res.json({
        success: true,
        data: {
          status: 'healthy',
          timestamp: new Date().toISOString(),
          websocketClients: this.clients.size,
          modelWatch: {
            running: this.deps.watcher?.isRunning() ?? false,
            knownModels: snapshot?.get()?.length ?? null,
            updatedAt: snapshot?.getUpdatedAt()?.toISOString() ?? null,
          },
        },
      });
    });

    // Error middleware
    this.app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
      if (res.headersSent) {
        next(error);
        return;
      }
      log.error('Unhandled route error', { path: req.path, error: errorMessage(error) });
      res.status(500).json({ success: false, error: 'Internal server error' });
    });
  }

  /**
   * Start listening; resolves with the bound port
   */
  async start(port: number, host?: string): Promise<number> {
    if (this.httpServer) {
      throw new Error('WebServer already started');
    }

    const server = await new Promise<HttpServer>((resolve, reject) => {
      const listening = this.app.listen(port, host ?? '0.0.0.0', () => resolve(listening));
      listening.once('error', reject);
    });
    this.httpServer = server;
    this.setupWebSocket(server);

    const address = server.address();
    const boundPort = typeof address === 'object' && address !== null ? address.port : port;
    log.info('Web server listening', { port: boundPort });
    return boundPort;
  }

  private setupWebSocket(server: HttpServer): void {
    this.wss = new WebSocketServer({ server, path: '/ws' });

    this.wss.on('connection', (ws: WebSocket) => {
      this.clients.add(ws);
      log.debug('WebSocket client connected', { clients: this.clients.size });

      ws.on('close', () => {
        this.clients.delete(ws);
      });

      ws.on('error', (error) => {
        log.warn('WebSocket client error', { error: error.message });
        this.clients.delete(ws);
      });
    });
  }

  /**
   * Push an event to every connected front-end
   */
  broadcast(event: BroadcastEvent): void {
    const message = JSON.stringify(event);
    this.clients.forEach((client) => {
      if (client.readyState === WebSocket.OPEN) {
        client.send(message);
      }
    });
  }

  getClientCount(): number {
    return this.clients.size;
  }

  async stop(): Promise<void> {
    this.clients.forEach((client) => client.terminate());
    this.clients.clear();

    const wss = this.wss;
    if (wss) {
      await new Promise<void>((resolve) => wss.close(() => resolve()));
      this.wss = null;
    }

    const server = this.httpServer;
    if (server) {
      await new Promise<void>((resolve, reject) =>
        server.close((error) => (error ? reject(error) : resolve()))
      );
      this.httpServer = null;
      log.info('Web server stopped');
    }
  }
}

function formatIssues(error: z.ZodError): string {
  return error.errors.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ');
}
