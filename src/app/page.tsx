import Link from "next/link";

import { FlashBanner } from "@/components/common/flash-banner";
import { MessageList } from "@/components/messages/message-list";
import { buttonVariants } from "@/components/ui/button";
import { resolveFlash, type SearchParams } from "@/lib/flash";
import { listRecentMessages } from "@/lib/messages";
import { getPageContext } from "@/lib/session";

export const dynamic = "force-dynamic";

export default async function HomePage({ searchParams }: { searchParams: Promise<SearchParams> }) {
  const [query, ctx] = await Promise.all([searchParams, getPageContext()]);
  const flash = resolveFlash(query);

  if (!ctx.currentUser) {
    return (
      <main>
        <FlashBanner flash={flash} />
        <section className="rounded-md border border-slate-200 bg-white p-8 text-center">
          <h1 className="text-2xl font-bold">What&apos;s happening?</h1>
          <p className="mt-2 text-sm text-slate-600">Sign up to post messages and follow the conversation.</p>
          <div className="mt-6 flex justify-center gap-2">
            <Link href="/signup" className={buttonVariants({ variant: "default" })}>
              Sign up
            </Link>
            <Link href="/login" className={buttonVariants({ variant: "outline" })}>
              Log in
            </Link>
          </div>
        </section>
      </main>
    );
  }

  const messages = await listRecentMessages();

  return (
    <main>
      <FlashBanner flash={flash} />
      <h1 className="mb-4 text-xl font-semibold">Latest messages</h1>
      <MessageList messages={messages} emptyText="Nobody has posted yet." />
    </main>
  );
}
