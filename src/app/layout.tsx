import type { Metadata } from "next";
import "./globals.css";

import { SiteHeader } from "@/components/nav/site-header";
import { getPageContext } from "@/lib/session";

export const metadata: Metadata = {
  title: "Chirp",
  description: "Short messages from people you know.",
};

export const viewport = {
  themeColor: "#0369a1",
};

export default async function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode;
}>) {
  const { currentUser } = await getPageContext();

  return (
    <html lang="en">
      <body className="min-h-screen bg-slate-50 font-sans text-slate-900 antialiased">
        <SiteHeader currentUser={currentUser} />
        <div className="mx-auto max-w-2xl px-4 py-6">{children}</div>
      </body>
    </html>
  );
}
