/**
 * Session and settings key derivation.
 *
 * A session is one sender, optionally scoped to a group. User settings are keyed by
 * the sender id alone and live in their own namespace, so a session key never
 * addresses a settings document.
 */

export const USER_SETTINGS_NAMESPACE = 'users';

export function resolveSession(senderId: string, groupId?: string): string {
  return groupId ? `${groupId}_${senderId}` : senderId;
}
