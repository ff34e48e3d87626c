import * as Sentry from "@sentry/nextjs";
import { NextResponse, type NextRequest } from "next/server";

import { canCreateMessage } from "@/lib/authorization";
import { redirectTo, redirectWithError, redirectWithFlash } from "@/lib/flash";
import { createMessage } from "@/lib/messages";
import { getRequestContext } from "@/lib/session";
import { formErrorCode } from "@/lib/validation/errors";
import { readForm } from "@/lib/validation/form";
import { MessageFormSchema } from "@/lib/validation/messages";

export const runtime = "nodejs";

export async function POST(req: NextRequest) {
  try {
    const ctx = await getRequestContext(req);
    const access = canCreateMessage(ctx);
    if (!access.ok) {
      console.warn("[MESSAGES_NEW] access denied", { reason: access.reason });
      return redirectWithFlash(req, "/", "unauthorized");
    }

    const parsed = MessageFormSchema.safeParse(await readForm(req));
    if (!parsed.success) {
      return redirectWithError(req, "/messages/compose", formErrorCode(parsed.error));
    }

    await createMessage({ userId: access.userId, text: parsed.data.text });

    return redirectTo(req, `/users/${access.userId}`);
  } catch (error) {
    console.error("[MESSAGES_NEW]", error);
    Sentry.captureException(error);
    return new NextResponse("Internal Server Error", { status: 500 });
  }
}
