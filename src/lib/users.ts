import { eq, or } from "drizzle-orm";

import { users } from "@/db/schema";
import { db } from "@/lib/db";
import { hashPassword, verifyPassword } from "@/lib/password";
import { normalizeUsername } from "@/lib/username";
import type { SignupInput } from "@/lib/validation/auth";

export type SessionUser = {
  id: number;
  username: string;
};

export type SignupResult =
  | { ok: true; user: SessionUser }
  | { ok: false; reason: "username_taken" };

const PG_UNIQUE_VIOLATION = "23505";

function isUniqueViolation(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === PG_UNIQUE_VIOLATION;
}

export async function signupUser(input: SignupInput): Promise<SignupResult> {
  const existing = await db.query.users.findFirst({
    where: or(eq(users.username, input.username), eq(users.email, input.email)),
    columns: { id: true },
  });
  if (existing) return { ok: false, reason: "username_taken" };

  const passwordHash = await hashPassword(input.password);

  try {
    const [user] = await db
      .insert(users)
      .values({
        username: input.username,
        email: input.email,
        imageUrl: input.imageUrl ?? null,
        headerImageUrl: input.headerImageUrl ?? null,
        passwordHash,
      })
      .returning({ id: users.id, username: users.username });
    return { ok: true, user };
  } catch (err) {
    // Lost a race with a concurrent sign-up for the same name or email.
    if (isUniqueViolation(err)) return { ok: false, reason: "username_taken" };
    throw err;
  }
}

/** Unknown usernames and wrong passwords both return null. */
export async function authenticateUser(username: string, password: string): Promise<SessionUser | null> {
  const normalized = normalizeUsername(username);
  if (!normalized) return null;

  const user = await db.query.users.findFirst({
    where: eq(users.username, normalized),
    columns: { id: true, username: true, passwordHash: true },
  });
  if (!user) return null;

  const valid = await verifyPassword(password, user.passwordHash);
  return valid ? { id: user.id, username: user.username } : null;
}

export async function getSessionUser(userId: number): Promise<SessionUser | null> {
  const user = await db.query.users.findFirst({
    where: eq(users.id, userId),
    columns: { id: true, username: true },
  });
  return user ?? null;
}

export async function getUserProfile(userId: number) {
  const user = await db.query.users.findFirst({
    where: eq(users.id, userId),
    columns: { id: true, username: true, imageUrl: true, headerImageUrl: true, bio: true, createdAt: true },
  });
  return user ?? null;
}

export type UserProfile = NonNullable<Awaited<ReturnType<typeof getUserProfile>>>;
