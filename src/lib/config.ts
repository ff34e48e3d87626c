import { z } from "zod";

export const DEFAULT_SESSION_SECRET = "chirp-dev-session-secret";

const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  DATABASE_URL: z.string().trim().min(1).default("postgresql://localhost:5432/chirp"),
  SESSION_SECRET: z.string().min(16, "SESSION_SECRET must be at least 16 characters").default(DEFAULT_SESSION_SECRET),
  SENTRY_DSN: z.string().trim().url().optional(),
});

export type AppConfig = {
  nodeEnv: "development" | "test" | "production";
  databaseUrl: string;
  sessionSecret: string;
  sentryDsn: string | null;
  isProduction: boolean;
};

export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  const parsed = EnvSchema.safeParse({
    NODE_ENV: env.NODE_ENV,
    DATABASE_URL: env.DATABASE_URL || undefined,
    SESSION_SECRET: env.SESSION_SECRET || undefined,
    SENTRY_DSN: env.SENTRY_DSN || undefined,
  });

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid environment: ${issue?.path.join(".") ?? "unknown"} ${issue?.message ?? ""}`.trim());
  }

  const { NODE_ENV, DATABASE_URL, SESSION_SECRET, SENTRY_DSN } = parsed.data;
  const isProduction = NODE_ENV === "production";

  if (isProduction && SESSION_SECRET === DEFAULT_SESSION_SECRET) {
    console.warn("[CONFIG] SESSION_SECRET is not set; sessions are signed with the development secret");
  }

  return {
    nodeEnv: NODE_ENV,
    databaseUrl: DATABASE_URL,
    sessionSecret: SESSION_SECRET,
    sentryDsn: SENTRY_DSN ?? null,
    isProduction,
  };
}

export const config = loadConfig(process.env);
