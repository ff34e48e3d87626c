import { NextResponse } from "next/server";

import { FORM_ERRORS, isFormErrorCode, type FormErrorCode } from "@/lib/validation/errors";

export type FlashTone = "success" | "danger" | "info";

const FLASH_MESSAGES = {
  unauthorized: { message: "Access unauthorized.", tone: "danger" },
  invalid_credentials: { message: "Invalid credentials.", tone: "danger" },
  username_taken: { message: "Username already taken", tone: "danger" },
  logged_out: { message: "You have successfully logged out.", tone: "success" },
  welcome: { message: "Welcome back!", tone: "success" },
} as const satisfies Record<string, { message: string; tone: FlashTone }>;

export type FlashCode = keyof typeof FLASH_MESSAGES;

export type Flash = { message: string; tone: FlashTone };

export type SearchParams = Record<string, string | string[] | undefined>;

function isFlashCode(value: string): value is FlashCode {
  return Object.prototype.hasOwnProperty.call(FLASH_MESSAGES, value);
}

/** Resolves `?flash=<code>` and `?error=<code>` search params into a banner; unknown codes render nothing. */
export function resolveFlash(params: SearchParams): Flash | null {
  const code = Array.isArray(params.flash) ? params.flash[0] : params.flash;
  if (code && isFlashCode(code)) return FLASH_MESSAGES[code];

  const error = Array.isArray(params.error) ? params.error[0] : params.error;
  if (error && isFormErrorCode(error)) return { message: FORM_ERRORS[error], tone: "danger" };

  return null;
}

export function redirectTo(req: Request, path: string) {
  return NextResponse.redirect(new URL(path, req.url), 302);
}

export function redirectWithFlash(req: Request, path: string, code: FlashCode) {
  const url = new URL(path, req.url);
  url.searchParams.set("flash", code);
  return NextResponse.redirect(url, 302);
}

export function redirectWithError(req: Request, path: string, code: FormErrorCode) {
  const url = new URL(path, req.url);
  url.searchParams.set("error", code);
  return NextResponse.redirect(url, 302);
}

export function flashPath(path: string, code: FlashCode) {
  return `${path}?flash=${code}`;
}
