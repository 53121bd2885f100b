/**
 * Shared Constants
 * ================
 * Application-wide limits and key prefixes
 */

export const SERVICE_NAME = "contacts-api";
export const API_VERSION = "1.0.0";

// Contacts listing
export const CONTACTS_DEFAULT_LIMIT = 10;
export const CONTACTS_MAX_LIMIT = 500;
export const UPCOMING_BIRTHDAYS_DEFAULT_DAYS = 7;
export const UPCOMING_BIRTHDAYS_MAX_DAYS = 366;

// Avatar uploads
export const AVATAR_MAX_BYTES = 5 * 1024 * 1024;
export const AVATAR_FOLDER = "ContactsApp";

// Redis key prefixes
export const REDIS_KEYS = {
  USER_SNAPSHOT: "user:",
  RATE_LIMIT: "rl:",
} as const;
