import { resolveSession } from '../src/core/session/SessionKeys.js';

describe('Session keys', () => {
  test('should use the sender id for private chats', () => {
    expect(resolveSession('10001')).toBe('10001');
  });

  test('should scope group chats by group and sender', () => {
    expect(resolveSession('10001', '555')).toBe('555_10001');
  });

  test('should treat an empty group id as a private chat', () => {
    expect(resolveSession('10001', '')).toBe('10001');
  });

  test('should be stable across calls', () => {
    expect(resolveSession('10001', '555')).toBe(resolveSession('10001', '555'));
  });
});
