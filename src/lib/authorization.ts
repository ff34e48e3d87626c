import type { Message } from "@/db/schema";
import type { RequestContext } from "@/lib/session";

/**
 * `authentication_required`: no signed-in user.
 * `authorization_denied`: signed in, but not the owner.
 */
export type AccessDeniedReason = "authentication_required" | "authorization_denied";

export type AccessDecision =
  | { ok: true; userId: number }
  | { ok: false; reason: AccessDeniedReason };

export function requireSignedIn(ctx: RequestContext): AccessDecision {
  if (!ctx.currentUser) return { ok: false, reason: "authentication_required" };
  return { ok: true, userId: ctx.currentUser.id };
}

export function canCreateMessage(ctx: RequestContext): AccessDecision {
  return requireSignedIn(ctx);
}

export function canDeleteMessage(ctx: RequestContext, message: Pick<Message, "userId">): AccessDecision {
  const signedIn = requireSignedIn(ctx);
  if (!signedIn.ok) return signedIn;
  if (signedIn.userId !== message.userId) return { ok: false, reason: "authorization_denied" };
  return signedIn;
}

export function isMessageOwner(ctx: RequestContext, message: Pick<Message, "userId">): boolean {
  return canDeleteMessage(ctx, message).ok;
}
