import type { NextRequest } from "next/server";

import { redirectWithFlash } from "@/lib/flash";
import { clearSessionCookie } from "@/lib/session";

export const runtime = "nodejs";

export async function POST(req: NextRequest) {
  const res = redirectWithFlash(req, "/login", "logged_out");
  clearSessionCookie(res);
  return res;
}
