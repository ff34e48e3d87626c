'use client';

import * as Sentry from '@sentry/nextjs';
import { useEffect } from 'react';

export default function GlobalError({
  error,
}: {
  error: Error & { digest?: string };
}) {
  useEffect(() => {
    Sentry.captureException(error);
  }, [error]);

  return (
    <html>
      <body>
        <div className="flex h-screen w-full flex-col items-center justify-center p-4 text-center">
          <h1 className="mb-4 text-2xl font-bold">Something went wrong!</h1>
          <p className="mb-8 text-slate-600">The error has been reported.</p>
          <button
            onClick={() => window.location.reload()}
            className="rounded-md bg-sky-600 px-5 py-2 text-white"
          >
            Try again
          </button>
        </div>
      </body>
    </html>
  );
}
