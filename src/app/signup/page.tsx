import Link from "next/link";
import { redirect } from "next/navigation";

import { FlashBanner } from "@/components/common/flash-banner";
import { Button } from "@/components/ui/button";
import { resolveFlash, type SearchParams } from "@/lib/flash";
import { getPageContext } from "@/lib/session";

export const dynamic = "force-dynamic";

const inputClass = "w-full rounded-md border border-slate-300 px-3 py-2 text-sm";

export default async function SignupPage({ searchParams }: { searchParams: Promise<SearchParams> }) {
  const [query, ctx] = await Promise.all([searchParams, getPageContext()]);
  if (ctx.currentUser) redirect("/");

  return (
    <main className="mx-auto max-w-sm">
      <FlashBanner flash={resolveFlash(query)} />
      <h1 className="mb-4 text-xl font-semibold">Join Chirp today.</h1>
      <form action="/auth/signup" method="post" className="space-y-3">
        <input name="username" placeholder="Username" autoComplete="username" required className={inputClass} />
        <input name="email" type="email" placeholder="E-mail" autoComplete="email" required className={inputClass} />
        <input
          name="password"
          type="password"
          placeholder="Password"
          autoComplete="new-password"
          minLength={6}
          required
          className={inputClass}
        />
        <input name="imageUrl" type="url" placeholder="(Optional) Image URL" className={inputClass} />
        <input name="headerImageUrl" type="url" placeholder="(Optional) Header Image URL" className={inputClass} />
        <Button type="submit" className="w-full">
          Sign up
        </Button>
      </form>
      <p className="mt-4 text-sm text-slate-600">
        Already have an account?{" "}
        <Link href="/login" className="text-sky-700 hover:underline">
          Log in
        </Link>
      </p>
    </main>
  );
}
