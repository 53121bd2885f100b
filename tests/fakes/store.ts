/**
 * In-memory tables backing the fake repositories.
 */

import type { RefreshToken, UserToken } from "../../src/modules/auth/auth.repository.js";
import type { Contact } from "../../src/modules/contacts/contacts.repository.js";
import type { User } from "../../src/modules/users/users.repository.js";

export type StoredRefreshToken = RefreshToken;
export type StoredUserToken = UserToken & { tokenHash: string };

export const store = {
  users: new Map<number, User>(),
  refreshTokens: new Map<number, StoredRefreshToken>(),
  userTokens: new Map<number, StoredUserToken>(),
  contacts: new Map<number, Contact>(),
};

const sequences = { users: 0, refreshTokens: 0, userTokens: 0, contacts: 0 };

export function nextId(table: keyof typeof sequences): number {
  sequences[table] += 1;
  return sequences[table];
}

export function resetStore(): void {
  store.users.clear();
  store.refreshTokens.clear();
  store.userTokens.clear();
  store.contacts.clear();
  sequences.users = 0;
  sequences.refreshTokens = 0;
  sequences.userTokens = 0;
  sequences.contacts = 0;
}
