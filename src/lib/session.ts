import crypto from "node:crypto";
import { cookies } from "next/headers";
import type { NextRequest, NextResponse } from "next/server";

import { config } from "@/lib/config";
import { getSessionUser, type SessionUser } from "@/lib/users";

export const SESSION_COOKIE = "chirp_session";
export const SESSION_MAX_AGE_SECONDS = 60 * 60 * 24 * 7;

/**
 * Per-request identity, built from the session cookie and passed explicitly
 * into authorization checks. `currentUser` is null for anonymous callers.
 */
export type RequestContext = {
  currentUser: SessionUser | null;
};

function sign(payload: string, secret: string) {
  return crypto.createHmac("sha256", secret).update(payload).digest("base64url");
}

type SessionValueOptions = {
  secret?: string;
  now?: Date;
};

// Allowance for clocks that run slightly ahead of the one that signed the value.
const CLOCK_SKEW_SECONDS = 60;

function epochSeconds(date: Date) {
  return Math.floor(date.getTime() / 1000);
}

/** Cookie value for a user: `<userId>.<issuedAt>.<signature>`, with `issuedAt` in epoch seconds. */
export function signSessionValue(
  userId: number,
  { secret = config.sessionSecret, now = new Date() }: SessionValueOptions = {},
): string {
  const payload = `${userId}.${epochSeconds(now)}`;
  return `${payload}.${sign(payload, secret)}`;
}

/** User id of a validly signed value issued within the session lifetime, else null. */
export function verifySessionValue(
  value: string | null | undefined,
  { secret = config.sessionSecret, now = new Date() }: SessionValueOptions = {},
): number | null {
  if (!value) return null;

  const parts = value.split(".");
  if (parts.length !== 3) return null;

  const [idPart, issuedAtPart, signaturePart] = parts;
  if (!idPart || !issuedAtPart || !signaturePart) return null;
  if (!/^[1-9]\d{0,14}$/.test(idPart) || !/^\d{1,12}$/.test(issuedAtPart)) return null;

  const expected = Buffer.from(sign(`${idPart}.${issuedAtPart}`, secret));
  const actual = Buffer.from(signaturePart);
  if (expected.length !== actual.length || !crypto.timingSafeEqual(expected, actual)) return null;

  const age = epochSeconds(now) - Number(issuedAtPart);
  if (age > SESSION_MAX_AGE_SECONDS || age < -CLOCK_SKEW_SECONDS) return null;

  return Number(idPart);
}

export async function resolveSession(value: string | null | undefined): Promise<RequestContext> {
  const userId = verifySessionValue(value);
  if (userId === null) return { currentUser: null };

  // A signed cookie can outlive its user; treat that caller as anonymous.
  const currentUser = await getSessionUser(userId);
  return { currentUser };
}

export function getRequestContext(req: NextRequest): Promise<RequestContext> {
  return resolveSession(req.cookies.get(SESSION_COOKIE)?.value);
}

export async function getPageContext(): Promise<RequestContext> {
  const cookieStore = await cookies();
  return resolveSession(cookieStore.get(SESSION_COOKIE)?.value);
}

export function setSessionCookie(res: NextResponse, userId: number) {
  res.cookies.set({
    name: SESSION_COOKIE,
    value: signSessionValue(userId),
    httpOnly: true,
    secure: config.isProduction,
    sameSite: "lax",
    path: "/",
    maxAge: SESSION_MAX_AGE_SECONDS,
  });
}

export function clearSessionCookie(res: NextResponse) {
  res.cookies.set({
    name: SESSION_COOKIE,
    value: "",
    httpOnly: true,
    secure: config.isProduction,
    sameSite: "lax",
    path: "/",
    maxAge: 0,
  });
}
