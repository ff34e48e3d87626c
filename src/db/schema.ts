import { relations } from "drizzle-orm";
import { index, integer, pgTable, serial, text, timestamp, varchar } from "drizzle-orm/pg-core";

// --- TABLES ---

/**
 * Users Table
 * Accounts that sign in with a username and password.
 * `passwordHash` never leaves the server; select public columns explicitly.
 */
export const users = pgTable("users", {
  id: serial("id").primaryKey(),
  username: varchar("username", { length: 20 }).notNull().unique(),
  email: varchar("email", { length: 255 }).notNull().unique(),
  imageUrl: text("image_url"),
  headerImageUrl: text("header_image_url"),
  bio: text("bio"),
  passwordHash: text("password_hash").notNull(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
});

/**
 * Messages Table
 * Short posts owned by a single user. `userId` is set at creation and never reassigned.
 */
export const messages = pgTable(
  "messages",
  {
    id: serial("id").primaryKey(),
    text: varchar("text", { length: 140 }).notNull(),
    timestamp: timestamp("timestamp").defaultNow().notNull(),
    userId: integer("user_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
  },
  (table) => [index("messages_user_id_idx").on(table.userId)],
);

// --- RELATIONS ---

export const usersRelations = relations(users, ({ many }) => ({
  messages: many(messages),
}));

export const messagesRelations = relations(messages, ({ one }) => ({
  user: one(users, {
    fields: [messages.userId],
    references: [users.id],
  }),
}));

export type User = typeof users.$inferSelect;
export type NewUser = typeof users.$inferInsert;
export type Message = typeof messages.$inferSelect;
export type NewMessage = typeof messages.$inferInsert;
