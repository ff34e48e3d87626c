import * as Sentry from "@sentry/nextjs";
import { NextResponse, type NextRequest } from "next/server";

import { redirectWithError, redirectWithFlash } from "@/lib/flash";
import { setSessionCookie } from "@/lib/session";
import { authenticateUser } from "@/lib/users";
import { LoginSchema } from "@/lib/validation/auth";
import { formErrorCode } from "@/lib/validation/errors";
import { readForm } from "@/lib/validation/form";

export const runtime = "nodejs";

export async function POST(req: NextRequest) {
  try {
    const parsed = LoginSchema.safeParse(await readForm(req));
    if (!parsed.success) {
      return redirectWithError(req, "/login", formErrorCode(parsed.error));
    }

    const user = await authenticateUser(parsed.data.username, parsed.data.password);
    if (!user) return redirectWithFlash(req, "/login", "invalid_credentials");

    const res = redirectWithFlash(req, "/", "welcome");
    setSessionCookie(res, user.id);
    return res;
  } catch (error) {
    console.error("[AUTH_LOGIN]", error);
    Sentry.captureException(error);
    return new NextResponse("Internal Server Error", { status: 500 });
  }
}
