import { addMinutes } from "date-fns";

import type { MockDb } from "./mock-db";

export const BASE_TIME = new Date("2024-03-05T12:00:00Z");

/**
 * Two users and three messages:
 * testuser1 owns "Test Message 1"; testuser2 owns "Test Message 2" and "Test Message 3".
 */
export function seedMessageViews(db: MockDb) {
  const testuser1 = db.seedUser({ username: "testuser1", email: "test@test.com" });
  const testuser2 = db.seedUser({ username: "testuser2", email: "test2@test.com" });

  const message1 = db.seedMessage({ text: "Test Message 1", userId: testuser1.id, timestamp: BASE_TIME });
  const message2 = db.seedMessage({ text: "Test Message 2", userId: testuser2.id, timestamp: addMinutes(BASE_TIME, 1) });
  const message3 = db.seedMessage({ text: "Test Message 3", userId: testuser2.id, timestamp: addMinutes(BASE_TIME, 2) });

  return { testuser1, testuser2, message1, message2, message3 };
}
