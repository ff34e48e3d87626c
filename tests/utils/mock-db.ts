import { messages, users } from "@/db/schema";
import type { Condition, Ordering } from "./drizzle-mock";

// In-memory fake of the Drizzle client surface the app uses. Test files
// replace "drizzle-orm" with ./drizzle-mock and "@/lib/db" with `mockDb.client`.

type UserRow = typeof users.$inferSelect;
type MessageRow = typeof messages.$inferSelect;
type Row = Record<string, unknown>;
type TableName = "users" | "messages";
type Columns = Record<string, boolean>;
type Selection = Record<string, unknown>;

export type FindOptions = {
  where?: Condition;
  columns?: Columns;
  with?: Record<string, true | { columns?: Columns }>;
  orderBy?: Ordering[];
  limit?: number;
};

type Operation = "query" | "insert" | "delete" | "execute";

const columnKeys = new Map<unknown, string>([
  [users.id, "id"],
  [users.username, "username"],
  [users.email, "email"],
  [users.imageUrl, "imageUrl"],
  [users.headerImageUrl, "headerImageUrl"],
  [users.bio, "bio"],
  [users.passwordHash, "passwordHash"],
  [users.createdAt, "createdAt"],
  [messages.id, "id"],
  [messages.text, "text"],
  [messages.timestamp, "timestamp"],
  [messages.userId, "userId"],
]);

const relationMap: Record<TableName, Record<string, { table: TableName; kind: "one" | "many"; from: string; to: string }>> = {
  messages: { user: { table: "users", kind: "one", from: "userId", to: "id" } },
  users: { messages: { table: "messages", kind: "many", from: "id", to: "userId" } },
};

function keyOf(column: unknown): string {
  const key = columnKeys.get(column);
  if (!key) throw new Error("mock-db: unknown column");
  return key;
}

function tableNameOf(table: unknown): TableName {
  if (table === users) return "users";
  if (table === messages) return "messages";
  throw new Error("mock-db: unknown table");
}

export function matches(row: Row, condition: Condition | undefined): boolean {
  if (!condition) return true;
  switch (condition.type) {
    case "eq":
      return row[keyOf(condition.column)] === condition.value;
    case "and":
      return condition.conditions.every((c) => matches(row, c));
    case "or":
      return condition.conditions.some((c) => matches(row, c));
  }
}

function comparable(value: unknown) {
  return value instanceof Date ? value.getTime() : value;
}

function compare(a: unknown, b: unknown): number {
  const left = comparable(a);
  const right = comparable(b);
  if (typeof left === "number" && typeof right === "number") return left - right;
  return String(left).localeCompare(String(right));
}

function project(row: Row, columns?: Columns): Row {
  if (!columns) return { ...row };
  const picked: Row = {};
  for (const [key, include] of Object.entries(columns)) {
    if (include) picked[key] = row[key];
  }
  return picked;
}

function select(row: Row, selection?: Selection): Row {
  if (!selection) return { ...row };
  const picked: Row = {};
  for (const [alias, column] of Object.entries(selection)) {
    picked[alias] = row[keyOf(column)];
  }
  return picked;
}

function dbError(message: string, code: string) {
  return Object.assign(new Error(message), { code });
}

const asString = (value: unknown) => (typeof value === "string" ? value : String(value));
const asNullableString = (value: unknown) => (typeof value === "string" ? value : null);
const asDate = (value: unknown) => (value instanceof Date ? value : new Date());

export function createMockDb() {
  const state: { users: UserRow[]; messages: MessageRow[]; nextId: { users: number; messages: number } } = {
    users: [],
    messages: [],
    nextId: { users: 1, messages: 1 },
  };
  const pendingErrors = new Map<Operation, unknown>();

  function takeError(op: Operation) {
    const error = pendingErrors.get(op);
    if (error === undefined) return;
    pendingErrors.delete(op);
    throw error;
  }

  function rowsOf(table: TableName): Row[] {
    return table === "users" ? state.users : state.messages;
  }

  function insertUser(values: Row): UserRow {
    const username = asString(values.username);
    const email = asString(values.email);
    if (state.users.some((u) => u.username === username || u.email === email)) {
      throw dbError('duplicate key value violates unique constraint "users_username_unique"', "23505");
    }
    const user: UserRow = {
      id: state.nextId.users++,
      username,
      email,
      imageUrl: asNullableString(values.imageUrl),
      headerImageUrl: asNullableString(values.headerImageUrl),
      bio: asNullableString(values.bio),
      passwordHash: asString(values.passwordHash),
      createdAt: asDate(values.createdAt),
    };
    state.users.push(user);
    return user;
  }

  function insertMessage(values: Row): MessageRow {
    const userId = Number(values.userId);
    if (!state.users.some((u) => u.id === userId)) {
      throw dbError('insert on table "messages" violates foreign key constraint "messages_user_id_users_id_fk"', "23503");
    }
    const message: MessageRow = {
      id: state.nextId.messages++,
      text: asString(values.text),
      timestamp: asDate(values.timestamp),
      userId,
    };
    state.messages.push(message);
    return message;
  }

  function insertRow(table: TableName, values: Row): Row {
    return table === "users" ? insertUser(values) : insertMessage(values);
  }

  function removeRows(table: TableName, condition: Condition): Row[] {
    if (table === "messages") {
      const removed = state.messages.filter((m) => matches(m, condition));
      state.messages = state.messages.filter((m) => !matches(m, condition));
      return removed;
    }
    const removed = state.users.filter((u) => matches(u, condition));
    const removedIds = new Set(removed.map((u) => u.id));
    state.users = state.users.filter((u) => !removedIds.has(u.id));
    state.messages = state.messages.filter((m) => !removedIds.has(m.userId));
    return removed;
  }

  function findMany(table: TableName, options: FindOptions = {}): Row[] {
    takeError("query");
    let rows = rowsOf(table).filter((row) => matches(row, options.where));

    for (const ordering of [...(options.orderBy ?? [])].reverse()) {
      const key = keyOf(ordering.column);
      const direction = ordering.type === "desc" ? -1 : 1;
      rows = [...rows].sort((a, b) => direction * compare(a[key], b[key]));
    }

    if (options.limit !== undefined) rows = rows.slice(0, options.limit);

    return rows.map((row) => {
      const result = project(row, options.columns);
      for (const [name, opts] of Object.entries(options.with ?? {})) {
        const relation = relationMap[table][name];
        if (!relation) throw new Error(`mock-db: unknown relation ${table}.${name}`);
        const related = rowsOf(relation.table)
          .filter((candidate) => candidate[relation.to] === row[relation.from])
          .map((candidate) => project(candidate, opts === true ? undefined : opts.columns));
        result[name] = relation.kind === "one" ? (related[0] ?? null) : related;
      }
      return result;
    });
  }

  function tableQuery(table: TableName) {
    return {
      findFirst: async (options: FindOptions = {}) => findMany(table, { ...options, limit: 1 })[0],
      findMany: async (options: FindOptions = {}) => findMany(table, options),
    };
  }

  const client = {
    query: {
      users: tableQuery("users"),
      messages: tableQuery("messages"),
    },
    insert: (table: unknown) => ({
      values: (values: Row) => ({
        returning: async (selection?: Selection) => {
          takeError("insert");
          return [select(insertRow(tableNameOf(table), values), selection)];
        },
      }),
    }),
    delete: (table: unknown) => ({
      where: (condition: Condition) => ({
        returning: async (selection?: Selection) => {
          takeError("delete");
          return removeRows(tableNameOf(table), condition).map((row) => select(row, selection));
        },
      }),
    }),
    execute: async (_query: unknown) => {
      takeError("execute");
      return { rows: [{ ok: 1 }] };
    },
  };

  return {
    client,
    state,
    seedUser(values: { username: string; email?: string; passwordHash?: string; imageUrl?: string | null; headerImageUrl?: string | null; bio?: string | null; createdAt?: Date }) {
      return insertUser({
        email: `${values.username}@example.com`,
        passwordHash: "scrypt$placeholder$placeholder",
        ...values,
      });
    },
    seedMessage(values: { text: string; userId: number; timestamp?: Date }) {
      return insertMessage(values);
    },
    failNext(op: Operation, error: unknown) {
      pendingErrors.set(op, error);
    },
    reset() {
      state.users = [];
      state.messages = [];
      state.nextId = { users: 1, messages: 1 };
      pendingErrors.clear();
    },
  };
}

export type MockDb = ReturnType<typeof createMockDb>;

export const mockDb = createMockDb();
