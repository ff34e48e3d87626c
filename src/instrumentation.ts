import * as Sentry from "@sentry/nextjs";

import { config } from "@/lib/config";

// Initializes Sentry on the server; Next.js calls register() once per runtime.

export function register() {
  if (!config.sentryDsn) return;

  if (process.env.NEXT_RUNTIME === "nodejs" || process.env.NEXT_RUNTIME === "edge") {
    Sentry.init({
      dsn: config.sentryDsn,
      environment: config.nodeEnv,
      tracesSampleRate: config.isProduction ? 0.2 : 1.0,
    });
  }
}

// Capture server-side request/rendering errors from App Router
export const onRequestError = Sentry.captureRequestError;
