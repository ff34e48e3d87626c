import { neon } from "@neondatabase/serverless";
import { drizzle } from "drizzle-orm/neon-http";

import * as schema from "@/db/schema";
import { config } from "@/lib/config";

const sql = neon(config.databaseUrl);

export const db = drizzle(sql, { schema });

export type Database = typeof db;
