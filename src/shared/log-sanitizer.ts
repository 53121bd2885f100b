/**
 * Log Sanitizer
 * =============
 * Redacts credentials from log context before it is serialized:
 * credential-named keys, bearer tokens, email-link tokens and URL userinfo.
 */

const MAX_DEPTH = 5;
const MAX_STRING_LENGTH = 1_000;
const MAX_ARRAY_LENGTH = 20;

const REDACTED = "[REDACTED]";

const SECRET_KEY = /^(?:authorization|cookie|set-cookie|hash)$|token|secret|password|api[_-]?key|_hash$/i;

const STRING_RULES: ReadonlyArray<[RegExp, string]> = [
  [/\bBearer\s+[\w.~+/=-]+/gi, `Bearer ${REDACTED}`],
  // Email links carry single-use tokens in the path.
  [/(\/(?:confirmed_email|reset_password)\/)[\w.~-]+/g, `$1${REDACTED}`],
  [/([?&](?:api_key|token|refresh_token|signature)=)[^&\s]+/gi, `$1${REDACTED}`],
];

const CONNECTION_URL = /^(?:https?|postgres(?:ql)?|redis|smtps?):\/\//i;

function scrubString(value: string): string {
  let s = STRING_RULES.reduce((acc, [re, replacement]) => acc.replace(re, replacement), value);

  // DATABASE_URL, REDIS_URL and SMTP URLs lose their credentials and query.
  if (CONNECTION_URL.test(s) && URL.canParse(s)) {
    const url = new URL(s);
    url.username = "";
    url.password = "";
    url.search = "";
    s = url.toString();
  }

  return s.length > MAX_STRING_LENGTH ? `${s.slice(0, MAX_STRING_LENGTH)}…(truncated)` : s;
}

function scrub(value: unknown, depth: number): unknown {
  if (typeof value === "string") {return scrubString(value);}
  if (value === null || typeof value !== "object") {return value;}
  if (depth >= MAX_DEPTH) {return "[Truncated depth]";}

  if (value instanceof Date) {return value.toISOString();}
  if (value instanceof Error) {return { name: value.name, message: scrubString(value.message) };}

  if (Array.isArray(value)) {
    const items = value.slice(0, MAX_ARRAY_LENGTH).map((item) => scrub(item, depth + 1));
    return value.length > MAX_ARRAY_LENGTH ? [...items, `…(${value.length - MAX_ARRAY_LENGTH} more)`] : items;
  }

  return Object.fromEntries(
    Object.entries(value).map(([key, item]) => [key, SECRET_KEY.test(key) ? REDACTED : scrub(item, depth + 1)])
  );
}

export function sanitizeForLogging(value: unknown): unknown {
  return scrub(value, 0);
}
