import * as Sentry from "@sentry/nextjs";
import { NextResponse, type NextRequest } from "next/server";

import { redirectTo, redirectWithError, redirectWithFlash } from "@/lib/flash";
import { setSessionCookie } from "@/lib/session";
import { signupUser } from "@/lib/users";
import { SignupSchema } from "@/lib/validation/auth";
import { formErrorCode } from "@/lib/validation/errors";
import { readForm } from "@/lib/validation/form";

export const runtime = "nodejs";

export async function POST(req: NextRequest) {
  try {
    const parsed = SignupSchema.safeParse(await readForm(req));
    if (!parsed.success) {
      return redirectWithError(req, "/signup", formErrorCode(parsed.error));
    }

    const result = await signupUser(parsed.data);
    if (!result.ok) return redirectWithFlash(req, "/signup", "username_taken");

    const res = redirectTo(req, "/");
    setSessionCookie(res, result.user.id);
    return res;
  } catch (error) {
    console.error("[AUTH_SIGNUP]", error);
    Sentry.captureException(error);
    return new NextResponse("Internal Server Error", { status: 500 });
  }
}
