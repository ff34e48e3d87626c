import { beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("drizzle-orm", () => import("../utils/drizzle-mock"));
vi.mock("@/lib/db", async () => ({ db: (await import("../utils/mock-db")).mockDb.client }));

import { GET } from "@/app/api/health/route";
import { mockDb } from "../utils/mock-db";

describe("GET /api/health", () => {
  beforeEach(() => {
    mockDb.reset();
  });

  it("reports a connected database", async () => {
    const res = await GET();

    expect(res.status).toBe(200);
    await expect(res.json()).resolves.toMatchObject({ status: "ok", database: "connected" });
  });

  it("reports a disconnected database", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    mockDb.failNext("execute", new Error("connection refused"));

    const res = await GET();

    expect(res.status).toBe(500);
    await expect(res.json()).resolves.toMatchObject({ status: "error", database: "disconnected" });
  });
});
