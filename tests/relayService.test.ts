import {
  CHAT_USAGE_NOTICE,
  MODEL_LIST_FAILURE_NOTICE,
  NO_MODELS_NOTICE,
  RelayService,
  parseCommand,
  replyText,
} from '../src/application/services/RelayService.js';
import { ConversationService } from '../src/application/services/ConversationService.js';
import { CompletionService } from '../src/application/services/CompletionService.js';
import { MessageAssembler } from '../src/application/services/MessageAssembler.js';
import { ModelDirectory } from '../src/application/services/ModelDirectory.js';
import { PromptLoader } from '../src/application/services/PromptLoader.js';
import { UserSettingsService } from '../src/application/services/UserSettingsService.js';
import { OpenAIApiClient } from '../src/infrastructure/http/OpenAIApiClient.js';
import { RemoteImageFetcher } from '../src/infrastructure/http/RemoteImageFetcher.js';
import { InboundMessage, MessageSegment } from '../src/core/entities/InboundMessage.js';
import { FakeReply, FakeHttpClient, jsonReply } from './helpers/FakeHttpClient.js';
import { InMemoryDocumentStore } from './helpers/InMemoryDocumentStore.js';

const text = (value: string): MessageSegment => ({ type: 'text', data: { text: value } });

function message(segments: MessageSegment[], groupId?: string): InboundMessage {
  return { senderId: '42', groupId, segments };
}

describe('parseCommand', () => {
  test('should detect /model with an argument', () => {
    expect(parseCommand([text('/model gpt-4o')])).toEqual({ name: 'model', args: [text('gpt-4o')] });
  });

  test('should detect a bare /chat', () => {
    expect(parseCommand([text('  /chat')])).toEqual({ name: 'chat', args: [] });
  });

  test('should keep segments after the command', () => {
    const image: MessageSegment = { type: 'image', data: { base64: 'AAAA' } };
    expect(parseCommand([{ type: 'unsupported', data: { originalType: 'at' } }, text('/chat  look'), image])).toEqual({
      name: 'chat',
      args: [text('look'), image],
    });
  });

  test('should not match words that merely start with a command', () => {
    expect(parseCommand([text('/models')])).toBeUndefined();
    expect(parseCommand([text('/chatty')])).toBeUndefined();
  });

  test('should not match commands after other content', () => {
    expect(parseCommand([text('hi /model')])).toBeUndefined();
    expect(parseCommand([{ type: 'image', data: { base64: 'AAAA' } }, text('/model')])).toBeUndefined();
  });
});

describe('replyText', () => {
  test('should map outcomes to outgoing text', () => {
    expect(replyText({ kind: 'ignored' })).toBeNull();
    expect(replyText({ kind: 'command', command: 'chat-usage', text: CHAT_USAGE_NOTICE })).toBe(CHAT_USAGE_NOTICE);
    expect(
      replyText({
        kind: 'completion',
        sessionKey: '42',
        model: 'm',
        result: { kind: 'empty', text: '' },
        persisted: false,
      })
    ).toBeNull();
  });
});

describe('RelayService', () => {
  let store: InMemoryDocumentStore;
  let settingsStore: InMemoryDocumentStore;
  let http: FakeHttpClient;
  let relay: RelayService;
  let completionReply: FakeReply;
  let modelsReply: FakeReply;

  beforeEach(() => {
    store = new InMemoryDocumentStore();
    settingsStore = new InMemoryDocumentStore();
    completionReply = jsonReply({ choices: [{ message: { content: 'Hi there' } }] });
    modelsReply = jsonReply({ data: [{ id: 'gpt-4o-mini' }, { id: 'gpt-3.5-turbo' }] });
    http = new FakeHttpClient((url) => (url.endsWith('/models') ? modelsReply : completionReply));

    const client = new OpenAIApiClient(http, { apiKey: 'test-key', baseUrl: 'https://api.example.test/v1' });
    const conversations = new ConversationService(store);
    const settings = new UserSettingsService(settingsStore, 'gpt-4o-mini');
    relay = new RelayService(
      new MessageAssembler(new RemoteImageFetcher(http)),
      conversations,
      new CompletionService(client, new PromptLoader(undefined)),
      settings,
      new ModelDirectory(client)
    );
  });

  test('should relay a group message and persist the exchange', async () => {
    const outcome = await relay.handleMessage(message([text('hello')], '7'));

    expect(outcome).toEqual({
      kind: 'completion',
      sessionKey: '7_42',
      model: 'gpt-4o-mini',
      result: { kind: 'reply', text: 'Hi there' },
      persisted: true,
    });
    expect(replyText(outcome)).toBe('Hi there');
    expect(await store.load('7_42')).toEqual([
      { role: 'user', content: 'hello' },
      { role: 'assistant', content: 'Hi there' },
    ]);
  });

  test('should send earlier turns as context', async () => {
    store.seed('42', [
      { role: 'user', content: 'first' },
      { role: 'assistant', content: 'reply' },
    ]);

    await relay.handleMessage(message([text('second')]));

    expect(http.requestBody(0)).toEqual({
      model: 'gpt-4o-mini',
      messages: [
        { role: 'user', content: 'first' },
        { role: 'assistant', content: 'reply' },
        { role: 'user', content: 'second' },
      ],
      temperature: 0.7,
    });
    expect(await store.load('42')).toHaveLength(4);
  });

  test('should not persist a failed completion', async () => {
    completionReply = { status: 503, statusText: 'Service Unavailable', body: 'overloaded' };

    const outcome = await relay.handleMessage(message([text('hello')]));

    expect(replyText(outcome)).toBe('Upstream returned error 503, please try again later.');
    expect(outcome).toMatchObject({ kind: 'completion', persisted: false });
    expect(store.saveCount).toBe(0);
  });

  test('should not persist or reply to a blank completion', async () => {
    completionReply = jsonReply({ choices: [{ message: { content: '  ' } }] });

    const outcome = await relay.handleMessage(message([text('hello')]));

    expect(replyText(outcome)).toBeNull();
    expect(store.saveCount).toBe(0);
  });

  test('should ignore messages with no usable content', async () => {
    await expect(relay.handleMessage(message([text('   ')]))).resolves.toEqual({ kind: 'ignored' });
    expect(http.calls).toHaveLength(0);
  });

  test('should answer a bare /chat with usage help', async () => {
    await expect(relay.handleMessage(message([text('/chat')]))).resolves.toEqual({
      kind: 'command',
      command: 'chat-usage',
      text: CHAT_USAGE_NOTICE,
    });
    expect(http.calls).toHaveLength(0);
  });

  test('should strip the /chat prefix before completing', async () => {
    await relay.handleMessage(message([text('/chat tell me a joke')]));

    expect(await store.load('42')).toEqual([
      { role: 'user', content: 'tell me a joke' },
      { role: 'assistant', content: 'Hi there' },
    ]);
  });

  test('should list models with capabilities', async () => {
    const outcome = await relay.handleMessage(message([text('/model')]));

    expect(outcome).toEqual({
      kind: 'command',
      command: 'model-list',
      text: 'gpt-3.5-turbo\nCapabilities: text\n\ngpt-4o-mini\nCapabilities: text, vision',
    });
  });

  test('should report an empty model list', async () => {
    modelsReply = jsonReply({ data: [] });
    const outcome = await relay.handleMessage(message([text('/model')]));
    expect(replyText(outcome)).toBe(NO_MODELS_NOTICE);
  });

  test('should report a failed model listing', async () => {
    modelsReply = { status: 401, statusText: 'Unauthorized', body: '{}' };
    const outcome = await relay.handleMessage(message([text('/model')]));
    expect(replyText(outcome)).toBe(MODEL_LIST_FAILURE_NOTICE);
  });

  test('should switch the model for later messages', async () => {
    const switched = await relay.handleMessage(message([text('/model  gpt-3.5-turbo ')]));
    expect(switched).toEqual({ kind: 'command', command: 'model-set', text: 'Switched to model: gpt-3.5-turbo' });
    expect(await settingsStore.load('42')).toEqual({ model: 'gpt-3.5-turbo' });

    const outcome = await relay.handleMessage(message([text('hello')], '7'));
    expect(outcome).toMatchObject({ kind: 'completion', model: 'gpt-3.5-turbo' });
    expect(http.requestBody(0)).toMatchObject({ model: 'gpt-3.5-turbo' });
  });

  test('should keep unrelated settings when switching models', async () => {
    settingsStore.seed('42', { model: 'old', locale: 'en' });
    await relay.handleMessage(message([text('/model new-model')]));
    expect(await settingsStore.load('42')).toEqual({ model: 'new-model', locale: 'en' });
  });

  test('should serialize concurrent messages on one session', async () => {
    await Promise.all([
      relay.handleMessage(message([text('one')])),
      relay.handleMessage(message([text('two')])),
    ]);

    expect(await store.load('42')).toEqual([
      { role: 'user', content: 'one' },
      { role: 'assistant', content: 'Hi there' },
      { role: 'user', content: 'two' },
      { role: 'assistant', content: 'Hi there' },
    ]);
  });
});
