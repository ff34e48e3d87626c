import { FORM_ERRORS } from "@/lib/validation/errors";

// Route segments and system-sounding names.
const DEFAULT_RESERVED_USERNAMES = [
  "admin",
  "api",
  "auth",
  "login",
  "logout",
  "messages",
  "root",
  "signup",
  "system",
  "users",
  "www",
] as const;

export const RESERVED_USERNAMES = new Set<string>(DEFAULT_RESERVED_USERNAMES);

export type UsernameParseResult =
  | { ok: true; normalized: string }
  | { ok: false; message: string };

export function normalizeUsername(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  if (!trimmed) return null;
  return trimmed.toLowerCase();
}

export function parseUsername(value: unknown): UsernameParseResult {
  const normalized = normalizeUsername(value);
  if (!normalized) {
    return { ok: false, message: FORM_ERRORS.username_required };
  }

  if (normalized.length < 3 || normalized.length > 20) {
    return { ok: false, message: FORM_ERRORS.username_length };
  }

  if (!/^[a-z0-9_]{3,20}$/.test(normalized)) {
    return { ok: false, message: FORM_ERRORS.username_charset };
  }

  if (RESERVED_USERNAMES.has(normalized)) {
    return { ok: false, message: FORM_ERRORS.username_reserved };
  }

  return { ok: true, normalized };
}
