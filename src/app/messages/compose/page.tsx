import { redirect } from "next/navigation";

import { FlashBanner } from "@/components/common/flash-banner";
import { Button } from "@/components/ui/button";
import { canCreateMessage } from "@/lib/authorization";
import { flashPath, resolveFlash, type SearchParams } from "@/lib/flash";
import { getPageContext } from "@/lib/session";
import { MESSAGE_MAX_LENGTH } from "@/lib/validation/messages";

export const dynamic = "force-dynamic";

export default async function ComposeMessagePage({ searchParams }: { searchParams: Promise<SearchParams> }) {
  const [query, ctx] = await Promise.all([searchParams, getPageContext()]);
  if (!canCreateMessage(ctx).ok) redirect(flashPath("/", "unauthorized"));

  return (
    <main>
      <FlashBanner flash={resolveFlash(query)} />
      <h1 className="mb-4 text-xl font-semibold">New message</h1>
      <form action="/messages/new" method="post" className="space-y-3">
        <textarea
          name="text"
          required
          rows={3}
          placeholder="What's happening?"
          className="w-full rounded-md border border-slate-300 p-3 text-sm"
        />
        <p className="text-xs text-slate-500">Up to {MESSAGE_MAX_LENGTH} characters.</p>
        <Button type="submit">Post</Button>
      </form>
    </main>
  );
}
