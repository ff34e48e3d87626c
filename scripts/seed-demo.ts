/*
  Demo seed script for local and preview databases.
  Safety: refuses to run unless SEED_DEMO_OK=1.

  Usage:
    npm run seed:demo
    npm run seed:demo -- --wipe
*/

import dotenv from "dotenv";
import { drizzle } from "drizzle-orm/neon-http";
import { neon } from "@neondatabase/serverless";
import { inArray, like, sql } from "drizzle-orm";
import * as schema from "../src/db/schema";
import { hashPassword } from "../src/lib/password";

// Load env like the app does (.env.local first).
dotenv.config({ path: ".env.local" });
dotenv.config();

const DEMO_PREFIX = "demo_";
const DEMO_PASSWORD = "demo-password";
const DEMO_USER_COUNT = 6;
const MESSAGES_PER_USER = 5;

const SAMPLE_TEXT = [
  "First post, be gentle.",
  "Coffee number three. Send help.",
  "Shipping a small fix before lunch.",
  "Anyone else reading about Postgres indexes tonight?",
  "The bus was early. Nobody believes me.",
  "Rain again. Staying in with a good book.",
  "Pairing sessions beat solo debugging every time.",
  "Finally cleaned up my inbox.",
  "New plant on the desk. Its name is Gerald.",
  "Weekend plans: absolutely nothing.",
  "Tried a new recipe, it mostly worked.",
  "Short thoughts, long day.",
];

type Args = {
  wipe: boolean;
};

function parseArgs(argv: string[]): Args {
  return {
    wipe: argv.includes("--wipe"),
  };
}

function requireEnv(name: string) {
  const v = process.env[name];
  if (!v) throw new Error(`${name} environment variable is not set`);
  return v;
}

function redactDatabaseUrl(databaseUrl: string) {
  try {
    const u = new URL(databaseUrl);
    if (u.password) u.password = "***";
    return u.toString();
  } catch {
    return databaseUrl.replace(/:\/\/([^:]+):([^@]+)@/g, "://$1:***@");
  }
}

function assertSafeToRun() {
  if (process.env.SEED_DEMO_OK !== "1") {
    throw new Error("Refusing to run: set SEED_DEMO_OK=1 to enable demo seeding.");
  }

  if (process.env.NODE_ENV === "production" && process.env.SEED_DEMO_ALLOW_PROD !== "1") {
    throw new Error(
      "Refusing to run with NODE_ENV=production. If you really intend this, set SEED_DEMO_ALLOW_PROD=1 as well.",
    );
  }
}

function mulberry32(seed: number) {
  let t = seed >>> 0;
  return () => {
    t += 0x6d2b79f5;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

function randInt(rng: () => number, min: number, max: number) {
  return Math.floor(rng() * (max - min + 1)) + min;
}

function makeDb() {
  const databaseUrl = requireEnv("DATABASE_URL");
  return drizzle(neon(databaseUrl), { schema, logger: false });
}

type SeedDb = ReturnType<typeof makeDb>;

async function countRows(db: SeedDb) {
  const [users] = await db.select({ count: sql<number>`count(*)` }).from(schema.users);
  const [messages] = await db.select({ count: sql<number>`count(*)` }).from(schema.messages);
  return {
    users: Number(users?.count ?? 0),
    messages: Number(messages?.count ?? 0),
  };
}

async function wipeDemoData(db: SeedDb) {
  // Messages go with their users (ON DELETE CASCADE).
  const deleted = await db
    .delete(schema.users)
    .where(like(schema.users.username, `${DEMO_PREFIX}%`))
    .returning({ id: schema.users.id });
  console.log(`[seed-demo] Removed ${deleted.length} demo users and their messages.`);
}

async function seedDemoData(db: SeedDb) {
  const rng = mulberry32(20240305);
  const now = Date.now();
  const passwordHash = await hashPassword(DEMO_PASSWORD);

  const usernames = Array.from({ length: DEMO_USER_COUNT }, (_, i) => `${DEMO_PREFIX}user${i + 1}`);

  const existing = await db.query.users.findMany({
    where: inArray(schema.users.username, usernames),
    columns: { username: true },
  });
  const taken = new Set(existing.map((u) => u.username));
  const toCreate = usernames.filter((username) => !taken.has(username));

  if (toCreate.length === 0) {
    console.log("[seed-demo] Demo users already present; run with --wipe to start over.");
    return countRows(db);
  }

  const created = await db
    .insert(schema.users)
    .values(
      toCreate.map((username) => ({
        username,
        email: `${username}@example.com`,
        passwordHash,
        bio: `Demo account ${username}.`,
        createdAt: new Date(now - randInt(rng, 30, 180) * 86400000),
      })),
    )
    .returning({ id: schema.users.id });

  const messageRows = created.flatMap((user) =>
    Array.from({ length: MESSAGES_PER_USER }, () => ({
      userId: user.id,
      text: SAMPLE_TEXT[randInt(rng, 0, SAMPLE_TEXT.length - 1)],
      timestamp: new Date(now - randInt(rng, 1, 30 * 24 * 60) * 60000),
    })),
  );

  if (messageRows.length > 0) {
    await db.insert(schema.messages).values(messageRows);
  }

  console.log(`[seed-demo] Created ${created.length} users and ${messageRows.length} messages.`);
  console.log(`[seed-demo] Demo users sign in with password "${DEMO_PASSWORD}".`);

  return countRows(db);
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  assertSafeToRun();

  const databaseUrl = requireEnv("DATABASE_URL");
  console.log(`[seed-demo] Target DB: ${redactDatabaseUrl(databaseUrl)}`);

  const db = makeDb();

  if (args.wipe) {
    await wipeDemoData(db);
    console.log("Demo wipe complete.");
    return;
  }

  const counts = await seedDemoData(db);

  console.log("\nCounts:");
  for (const [k, v] of Object.entries(counts)) {
    console.log(`- ${k}: ${v}`);
  }
  console.log("\nDemo seed complete. Run with --wipe to remove demo rows.");
}

main().catch((err) => {
  console.error("\n[seed-demo] ERROR");
  console.error(err);
  process.exit(1);
});
