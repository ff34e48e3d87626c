import { NextRequest } from "next/server";

import { SESSION_COOKIE, signSessionValue } from "@/lib/session";

export const BASE_URL = "http://localhost";

export function sessionCookie(userId: number) {
  return `${SESSION_COOKIE}=${signSessionValue(userId)}`;
}

/** A POST as the browser sends it from an HTML form, optionally signed in as `userId`. */
export function formPost(path: string, fields?: Record<string, string>, opts: { userId?: number; cookie?: string } = {}) {
  const headers = new Headers();
  const cookie = opts.cookie ?? (opts.userId !== undefined ? sessionCookie(opts.userId) : undefined);
  if (cookie) headers.set("cookie", cookie);

  return new NextRequest(`${BASE_URL}${path}`, {
    method: "POST",
    headers,
    body: fields ? new URLSearchParams(fields) : undefined,
  });
}

export function routeParams<T extends Record<string, string>>(params: T) {
  return { params: Promise.resolve(params) };
}

export function redirectTarget(res: Response) {
  const location = res.headers.get("location");
  if (!location) throw new Error(`Expected a redirect, got ${res.status}`);
  const url = new URL(location);
  return { pathname: url.pathname, searchParams: Object.fromEntries(url.searchParams) };
}

let pageUserId: number | null = null;

/** Sets who the mocked `cookies()` of next/headers reports as signed in. */
export function setPageUser(userId: number | null) {
  pageUserId = userId;
}

export function mockCookieStore() {
  return {
    get(name: string) {
      if (name !== SESSION_COOKIE || pageUserId === null) return undefined;
      return { name, value: signSessionValue(pageUserId) };
    },
  };
}
