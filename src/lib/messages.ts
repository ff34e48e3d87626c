import { and, desc, eq } from "drizzle-orm";

import { messages } from "@/db/schema";
import { db } from "@/lib/db";

const DEFAULT_LIST_LIMIT = 100;

const authorColumns = { id: true, username: true, imageUrl: true } as const;

export async function getMessageWithAuthor(messageId: number) {
  return db.query.messages.findFirst({
    where: eq(messages.id, messageId),
    with: { user: { columns: authorColumns } },
  });
}

export type MessageWithAuthor = NonNullable<Awaited<ReturnType<typeof getMessageWithAuthor>>>;

export async function createMessage(params: { userId: number; text: string }) {
  const [message] = await db
    .insert(messages)
    .values({ userId: params.userId, text: params.text, timestamp: new Date() })
    .returning();
  return message;
}

/**
 * Removes a message only when `ownerId` owns it, in a single statement.
 * Returns false when no row matched.
 */
export async function deleteOwnedMessage(params: { messageId: number; ownerId: number }): Promise<boolean> {
  const deleted = await db
    .delete(messages)
    .where(and(eq(messages.id, params.messageId), eq(messages.userId, params.ownerId)))
    .returning({ id: messages.id });
  return deleted.length > 0;
}

export async function listUserMessages(userId: number, limit = DEFAULT_LIST_LIMIT): Promise<MessageWithAuthor[]> {
  return db.query.messages.findMany({
    where: eq(messages.userId, userId),
    orderBy: [desc(messages.timestamp)],
    limit,
    with: { user: { columns: authorColumns } },
  });
}

export async function listRecentMessages(limit = DEFAULT_LIST_LIMIT): Promise<MessageWithAuthor[]> {
  return db.query.messages.findMany({
    orderBy: [desc(messages.timestamp)],
    limit,
    with: { user: { columns: authorColumns } },
  });
}
