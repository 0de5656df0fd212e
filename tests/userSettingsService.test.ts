import { UserSettingsService } from '../src/application/services/UserSettingsService.js';
import { InMemoryDocumentStore } from './helpers/InMemoryDocumentStore.js';

describe('UserSettingsService', () => {
  let store: InMemoryDocumentStore;
  let service: UserSettingsService;

  beforeEach(() => {
    store = new InMemoryDocumentStore();
    service = new UserSettingsService(store, 'gpt-4o-mini');
  });

  test('should fall back to the default model', async () => {
    await expect(service.loadSettings('42')).resolves.toEqual({});
    await expect(service.getModel('42')).resolves.toBe('gpt-4o-mini');
    expect(service.getDefaultModel()).toBe('gpt-4o-mini');
  });

  test('should store the preference under the sender id', async () => {
    await expect(service.setModel('42', 'gpt-4o')).resolves.toBe(true);
    expect(await store.load('42')).toEqual({ model: 'gpt-4o' });
    await expect(service.getModel('42')).resolves.toBe('gpt-4o');
  });

  test('should treat an empty model as unset', async () => {
    store.seed('42', { model: '' });
    await expect(service.getModel('42')).resolves.toBe('gpt-4o-mini');
  });

  test('should ignore an unusable model value but keep other fields', async () => {
    store.seed('42', { model: 42, locale: 'en' });

    await expect(service.getModel('42')).resolves.toBe('gpt-4o-mini');
    await service.setModel('42', 'gpt-4o');

    expect(await store.load('42')).toEqual({ model: 'gpt-4o', locale: 'en' });
  });

  test('should replace a document that is not an object', async () => {
    store.seed('42', ['not', 'settings']);

    await expect(service.loadSettings('42')).resolves.toEqual({});
    await service.setModel('42', 'gpt-4o');
    expect(await store.load('42')).toEqual({ model: 'gpt-4o' });
  });

  test('should report a failed save', async () => {
    store.failSaves = true;
    await expect(service.setModel('42', 'gpt-4o')).resolves.toBe(false);
  });
});
