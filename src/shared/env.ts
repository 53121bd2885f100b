/**
 * Environment Helpers
 * ===================
 * Typed readers over `process.env`. Empty strings count as unset.
 */

export function envString(key: string): string | undefined {
  const raw = process.env[key];
  const trimmed = typeof raw === "string" ? raw.trim() : "";
  return trimmed.length > 0 ? trimmed : undefined;
}

export function envInt(key: string, fallback: number): number {
  const raw = envString(key);
  if (!raw) {return fallback;}
  const v = Number(raw);
  return Number.isFinite(v) && v > 0 ? Math.floor(v) : fallback;
}

export function envBool(key: string, fallback: boolean): boolean {
  const raw = envString(key)?.toLowerCase();
  if (raw === undefined) {return fallback;}
  if (raw === "1" || raw === "true" || raw === "yes") {return true;}
  if (raw === "0" || raw === "false" || raw === "no") {return false;}
  return fallback;
}

export function envList(key: string): string[] {
  const raw = envString(key);
  if (!raw) {return [];}
  return Array.from(
    new Set(
      raw
        .split(",")
        .map((s) => s.trim())
        .filter(Boolean)
    )
  );
}
