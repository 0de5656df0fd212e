import path from 'path';
import { Config } from '../config.js';
import { USER_SETTINGS_NAMESPACE } from '../core/session/SessionKeys.js';
import { FileDocumentStore } from '../infrastructure/storage/FileDocumentStore.js';
import { HttpClient } from '../infrastructure/http/HttpClient.js';
import { OpenAIApiClient } from '../infrastructure/http/OpenAIApiClient.js';
import { RemoteImageFetcher } from '../infrastructure/http/RemoteImageFetcher.js';
import { WebServer } from '../infrastructure/web/WebServer.js';
import { ConversationService } from '../application/services/ConversationService.js';
import { CompletionService } from '../application/services/CompletionService.js';
import { MessageAssembler } from '../application/services/MessageAssembler.js';
import { ModelDirectory } from '../application/services/ModelDirectory.js';
import { ModelWatcher } from '../application/services/ModelWatcher.js';
import { PromptLoader } from '../application/services/PromptLoader.js';
import { RelayService } from '../application/services/RelayService.js';
import { UserSettingsService } from '../application/services/UserSettingsService.js';
import { createLogger, setLogLevel } from '../utils/logger.js';

const log = createLogger('app');

/**
 * Composition root: builds every component, owns the shared HTTP client and
 * the web server, and tears them down in reverse order.
 */
export class RelayApp {
  readonly httpClient: HttpClient;
  readonly sessionStore: FileDocumentStore;
  readonly settingsStore: FileDocumentStore;
  readonly relay: RelayService;
  readonly conversations: ConversationService;
  readonly settings: UserSettingsService;
  readonly models: ModelDirectory;
  readonly watcher: ModelWatcher;
  readonly webServer: WebServer;
  private started = false;

  constructor(private config: Config) {
    if (config.server.debug) {
      setLogLevel('debug');
    }

    // Infrastructure
    this.httpClient = new HttpClient();
    this.sessionStore = new FileDocumentStore(config.storage.dataDir);
    this.settingsStore = new FileDocumentStore(path.join(config.storage.dataDir, USER_SETTINGS_NAMESPACE));
    const openai = new OpenAIApiClient(this.httpClient, {
      apiKey: config.openai.apiKey,
      baseUrl: config.openai.baseUrl,
    });

    // Services
    this.conversations = new ConversationService(this.sessionStore);
    this.settings = new UserSettingsService(this.settingsStore, config.openai.model);
    this.models = new ModelDirectory(openai);
    this.relay = new RelayService(
      new MessageAssembler(new RemoteImageFetcher(this.httpClient)),
      this.conversations,
      new CompletionService(openai, new PromptLoader(config.prompt.file)),
      this.settings,
      this.models
    );
    this.watcher = new ModelWatcher(this.models);

    this.webServer = new WebServer({
      relay: this.relay,
      conversations: this.conversations,
      settings: this.settings,
      models: this.models,
      watcher: this.watcher,
    });

    this.watcher.onChange((change, notice) => {
      this.webServer.broadcast({
        type: 'models_changed',
        groupId: config.modelWatch.noticeGroupId,
        added: change.added,
        removed: change.removed,
        text: notice,
      });
    });
  }

  /**
   * Resolves with the bound HTTP port
   */
  async start(): Promise<number> {
    this.httpClient.start();
    const port = await this.webServer.start(this.config.server.port);

    if (this.config.modelWatch.intervalSeconds > 0 && this.config.openai.apiKey) {
      this.watcher.start(this.config.modelWatch.intervalSeconds * 1000);
    } else {
      log.info('Model watch disabled');
    }

    this.started = true;
    return port;
  }

  async shutdown(): Promise<void> {
    if (!this.started) {
      await this.httpClient.close();
      return;
    }
    this.started = false;

    this.watcher.stop();
    await this.webServer.stop();
    await this.httpClient.close();
    log.info('Relay stopped');
  }
}
