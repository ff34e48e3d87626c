import Link from "next/link";
import { PenSquare } from "lucide-react";

import { SignOutAction } from "@/components/auth/sign-out-button";
import { buttonVariants } from "@/components/ui/button";
import type { SessionUser } from "@/lib/users";

const guestLinks = [
  { href: "/signup", label: "Sign up" },
  { href: "/login", label: "Log in" },
];

export function SiteHeader({ currentUser }: { currentUser: SessionUser | null }) {
  return (
    <header className="sticky top-0 z-50 w-full border-b bg-white">
      <div className="mx-auto flex h-16 max-w-2xl items-center justify-between px-4">
        <Link href="/" className="text-2xl font-bold text-sky-700">
          Chirp
        </Link>

        <nav className="flex items-center space-x-2">
          {currentUser ? (
            <>
              <Link href="/messages/compose" className={buttonVariants({ variant: "default", size: "sm" })}>
                <PenSquare className="mr-2 h-4 w-4" aria-hidden="true" />
                New message
              </Link>
              <Link href={`/users/${currentUser.id}`} className={buttonVariants({ variant: "ghost", size: "sm" })}>
                @{currentUser.username}
              </Link>
              <SignOutAction />
            </>
          ) : (
            guestLinks.map((link) => (
              <Link key={link.href} href={link.href} className={buttonVariants({ variant: "ghost", size: "sm" })}>
                {link.label}
              </Link>
            ))
          )}
        </nav>
      </div>
    </header>
  );
}
