/**
 * Users Module
 * ============
 * Profiles, avatar uploads and the profile snapshot cache.
 */

export { usersRouter } from "./users.routes.js";
export * as usersService from "./users.service.js";
export * as usersRepository from "./users.repository.js";
export type * from "./users.schemas.js";
