import type { RequestHandler } from "express";

import { extractBearerToken, verifyAccessToken } from "../shared/auth.js";
import { type AuthContext, setRequestAuth } from "../shared/auth-context.js";
import { ConfigurationError } from "../shared/errors.js";

/**
 * Populates `req.auth` when the request carries a valid access token
 * (`Authorization: Bearer <jwt>`). Invalid tokens leave the request anonymous;
 * `requireUserAuth()` decides whether that is acceptable.
 */
export const authContextMiddleware: RequestHandler = (req, _res, next) => {
  setRequestAuth(req, undefined);

  const bearer = extractBearerToken(req.headers.authorization);
  if (!bearer) {return next();}

  void verifyAccessToken(bearer)
    .then((claims) => {
      setRequestAuth(req, {
        kind: "user",
        userId: Number(claims.sub),
        email: claims.email,
      } satisfies AuthContext);
      next();
    })
    .catch((err: unknown) => {
      // If the server is misconfigured, surface it; otherwise treat as unauthenticated.
      if (err instanceof ConfigurationError) {return next(err);}
      return next();
    });
};
