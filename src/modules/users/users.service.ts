/**
 * Users Service
 * =============
 * Profile reads (cache-first) and avatar updates.
 */

import { createHash } from "node:crypto";

import { AVATAR_FOLDER } from "../../shared/constants.js";
import { AuthenticationError, NotFoundError } from "../../shared/errors.js";
import { getMediaHost } from "../../shared/media.js";
import { cacheUserProfile, evictUserProfile, getCachedUserProfile } from "./users.cache.js";
import * as usersRepository from "./users.repository.js";
import type { User } from "./users.repository.js";
import type { UserProfile } from "./users.schemas.js";

export function toUserProfile(user: User): UserProfile {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    avatar: user.avatar,
    confirmed: user.confirmed,
    created_at: user.createdAt.toISOString(),
  };
}

/**
 * Default avatar for new accounts.
 */
export function gravatarUrl(email: string): string {
  const digest = createHash("md5").update(usersRepository.normalizeEmail(email)).digest("hex");
  return `https://www.gravatar.com/avatar/${digest}?d=identicon`;
}

export async function getProfile(userId: number): Promise<UserProfile> {
  const cached = await getCachedUserProfile(userId);
  if (cached) {return cached;}

  const user = await usersRepository.getUserById(userId);
  // A valid token for a vanished account is a credentials problem, not a 404.
  if (!user) {throw new AuthenticationError("Could not validate credentials");}

  const profile = toUserProfile(user);
  await cacheUserProfile(profile);
  return profile;
}

export async function updateAvatar(userId: number, file: { buffer: Buffer }): Promise<UserProfile> {
  const user = await usersRepository.getUserById(userId);
  if (!user) {throw new AuthenticationError("Could not validate credentials");}

  const { url } = await getMediaHost().uploadAvatar({
    buffer: file.buffer,
    publicId: `${AVATAR_FOLDER}/user-${user.id}`,
  });

  const updated = await usersRepository.updateAvatar(userId, url);
  if (!updated) {throw new NotFoundError("User", String(userId));}

  await evictUserProfile(userId);
  return toUserProfile(updated);
}
