import Link from "next/link";

export default function NotFound() {
  return (
    <main className="py-16 text-center">
      <h1 className="text-2xl font-bold">Not found</h1>
      <p className="mt-2 text-sm text-slate-600">That page or message does not exist.</p>
      <Link href="/" className="mt-6 inline-block text-sky-700 hover:underline">
        Back home
      </Link>
    </main>
  );
}
