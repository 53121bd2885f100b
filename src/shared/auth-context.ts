/**
 * Request Auth Context
 * ====================
 * What `authContextMiddleware` learned about the caller.
 */

export type UserAuthContext = {
  kind: "user";
  userId: number;
  email: string;
};

export type AuthContext = UserAuthContext;

export function isUserAuth(ctx: AuthContext | undefined | null): ctx is UserAuthContext {
  return Boolean(ctx && ctx.kind === "user");
}

function isAuthContext(value: unknown): value is AuthContext {
  return (
    typeof value === "object" &&
    value !== null &&
    "kind" in value &&
    value.kind === "user" &&
    "userId" in value &&
    typeof value.userId === "number" &&
    "email" in value &&
    typeof value.email === "string"
  );
}

/**
 * Accessors for storing auth context on Express `req` without relying on
 * global type augmentation.
 */
export function getRequestAuth(req: object): AuthContext | undefined {
  if (!("auth" in req)) {return undefined;}
  return isAuthContext(req.auth) ? req.auth : undefined;
}

export function setRequestAuth(req: object, ctx: AuthContext | undefined): void {
  Object.assign(req, { auth: ctx });
}
