import type { Request, RequestHandler } from "express";

import { getRequestAuth, isUserAuth, type UserAuthContext } from "../shared/auth-context.js";
import { AuthenticationError } from "../shared/errors.js";

export function requireUserAuth(): RequestHandler {
  return (req, _res, next) => {
    if (!isUserAuth(getRequestAuth(req))) {
      return next(new AuthenticationError("Could not validate credentials"));
    }
    return next();
  };
}

/**
 * Reads the caller on routes mounted behind `requireUserAuth()`.
 */
export function getUserAuth(req: Request): UserAuthContext {
  const auth = getRequestAuth(req);
  if (!isUserAuth(auth)) {throw new AuthenticationError("Could not validate credentials");}
  return auth;
}
