import { Pool } from "pg";
import { z } from "zod";
import type { AppConfig } from "./config.js";
import { StorageError, UnknownUserError, errorMessage } from "./errors.js";
import { createMemoryStorage } from "./memoryStorage.js";
import { FREQUENCIES } from "./types.js";
import type { Challenge, Completion, CompletionCountRow, Frequency, User } from "./types.js";

/**
 * Persistence for users, challenges and completions.
 *
 * Storage holds no business rules beyond linkage, with one exception:
 * `replaceActiveChallenge` retires the previous active challenge and inserts
 * the new one as a single unit, so a user never ends up with zero or two
 * active challenges after a failure part-way through.
 */
export interface Storage {
  ensureSchema(): Promise<void>;
  upsertUser(params: { id: string; handle: string | null; displayName: string | null; now: string }): Promise<User>;
  getUser(id: string): Promise<User | null>;
  replaceActiveChallenge(params: {
    userId: string;
    text: string;
    frequency: Frequency;
    createdAt: string;
  }): Promise<Challenge>;
  listActiveChallenges(userId: string): Promise<Challenge[]>;
  listChallenges(userId: string): Promise<Challenge[]>;
  insertCompletion(params: { userId: string; challengeId: number; completedAt: string }): Promise<Completion>;
  listCompletions(userId: string): Promise<Completion[]>;
  /** Every registered user with their completion count after `sinceIso`, ranked. */
  completionCountsSince(sinceIso: string): Promise<CompletionCountRow[]>;
  close(): Promise<void>;
}

/** The slice of pg's Pool / PoolClient this module talks to */
export interface SqlClient {
  query(text: string, params?: unknown[]): Promise<{ rows: unknown[] }>;
}

export interface SqlPool extends SqlClient {
  connect(): Promise<SqlClient & { release(err?: Error | boolean): void }>;
  end(): Promise<void>;
}

export function createPgPool(params: { connectionString: string; ssl: boolean }): SqlPool {
  const pool = new Pool({
    connectionString: params.connectionString,
    ssl: params.ssl ? { rejectUnauthorized: false } : undefined,
  });

  pool.on("error", (err) => {
    console.error("❌ Idle Postgres client error:", err.message);
  });

  return {
    query: (text, values) => pool.query(text, values),
    connect: async () => {
      const client = await pool.connect();
      return {
        query: (text, values) => client.query(text, values),
        release: (err) => client.release(err),
      };
    },
    end: () => pool.end(),
  };
}

const UserRow = z.object({
  id: z.string(),
  handle: z.string().nullable(),
  display_name: z.string().nullable(),
  registered_at: z.string(),
  updated_at: z.string(),
});

const ChallengeRow = z.object({
  id: z.coerce.number().int(),
  user_id: z.string(),
  text: z.string(),
  frequency: z.enum(FREQUENCIES),
  created_at: z.string(),
  active: z.boolean(),
});

const CompletionRow = z.object({
  id: z.coerce.number().int(),
  user_id: z.string(),
  challenge_id: z.coerce.number().int(),
  completed_at: z.string(),
});

const CountRow = z.object({
  user_id: z.string(),
  handle: z.string().nullable(),
  display_name: z.string().nullable(),
  completion_count: z.coerce.number().int(),
});

function toUser(r: z.infer<typeof UserRow>): User {
  return {
    id: r.id,
    handle: r.handle,
    displayName: r.display_name,
    registeredAt: r.registered_at,
    updatedAt: r.updated_at,
  };
}

function toChallenge(r: z.infer<typeof ChallengeRow>): Challenge {
  return {
    id: r.id,
    userId: r.user_id,
    text: r.text,
    frequency: r.frequency,
    createdAt: r.created_at,
    active: r.active,
  };
}

function toCompletion(r: z.infer<typeof CompletionRow>): Completion {
  return {
    id: r.id,
    userId: r.user_id,
    challengeId: r.challenge_id,
    completedAt: r.completed_at,
  };
}

function sqlStateOf(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
}

function wrapError(op: string, err: unknown): unknown {
  if (err instanceof UnknownUserError || err instanceof StorageError) return err;
  return new StorageError(`${op} failed: ${errorMessage(err)}`, sqlStateOf(err), { cause: err });
}

/**
 * Runs one statement and validates every returned row.
 * Driver errors and unexpected row shapes both become StorageError.
 */
async function q<T>(client: SqlClient, op: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, text: string, params: unknown[] = []) {
  let rows: unknown[];
  try {
    rows = (await client.query(text, params)).rows;
  } catch (err) {
    throw wrapError(op, err);
  }

  const parsed = z.array(schema).safeParse(rows);
  if (!parsed.success) {
    throw new StorageError(`${op} returned unexpected rows: ${parsed.error.issues[0]?.message ?? "invalid"}`);
  }
  return parsed.data;
}

const NoRows = z.unknown();

/**
 * pg does not allow several commands in one prepared statement,
 * so the schema is applied one statement at a time.
 */
const SCHEMA = [
  `
  CREATE TABLE IF NOT EXISTS users (
    id TEXT PRIMARY KEY,
    handle TEXT,
    display_name TEXT,
    registered_seq BIGSERIAL NOT NULL,
    registered_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  )`,
  `
  CREATE TABLE IF NOT EXISTS challenges (
    id SERIAL PRIMARY KEY,
    user_id TEXT NOT NULL REFERENCES users(id),
    text TEXT NOT NULL,
    frequency TEXT NOT NULL CHECK (frequency IN ('daily', 'weekly')),
    created_at TEXT NOT NULL,
    active BOOLEAN NOT NULL DEFAULT TRUE
  )`,
  `
  CREATE TABLE IF NOT EXISTS completions (
    id SERIAL PRIMARY KEY,
    user_id TEXT NOT NULL REFERENCES users(id),
    challenge_id INTEGER NOT NULL REFERENCES challenges(id),
    completed_at TEXT NOT NULL
  )`,
  `CREATE UNIQUE INDEX IF NOT EXISTS ux_challenges_one_active ON challenges(user_id) WHERE active`,
  `CREATE INDEX IF NOT EXISTS idx_challenges_user_created ON challenges(user_id, created_at)`,
  `CREATE INDEX IF NOT EXISTS idx_completions_completed_at ON completions(completed_at)`,
  `CREATE INDEX IF NOT EXISTS idx_completions_user_completed ON completions(user_id, completed_at)`,
];

const CHALLENGE_COLUMNS = "id, user_id, text, frequency, created_at, active";
const COMPLETION_COLUMNS = "id, user_id, challenge_id, completed_at";
const USER_COLUMNS = "id, handle, display_name, registered_at, updated_at";

export function createPgStorage(pool: SqlPool): Storage {
  async function withTransaction<T>(op: string, fn: (client: SqlClient) => Promise<T>): Promise<T> {
    let client: SqlClient & { release(err?: Error | boolean): void };
    try {
      client = await pool.connect();
    } catch (err) {
      throw wrapError(op, err);
    }

    try {
      await q(client, op, NoRows, "BEGIN");
      const result = await fn(client);
      await q(client, op, NoRows, "COMMIT");
      client.release();
      return result;
    } catch (err) {
      try {
        await client.query("ROLLBACK");
        client.release();
      } catch (rollbackErr) {
        console.error(`❌ ${op}: rollback failed:`, errorMessage(rollbackErr));
        // a client whose rollback failed must not go back to the pool
        client.release(true);
      }
      throw wrapError(op, err);
    }
  }

  return {
    async ensureSchema() {
      for (const statement of SCHEMA) {
        await q(pool, "ensureSchema", NoRows, statement.trim());
      }
    },

    async upsertUser(params) {
      const rows = await q(
        pool,
        "upsertUser",
        UserRow,
        `INSERT INTO users (id, handle, display_name, registered_at, updated_at)
         VALUES ($1, $2, $3, $4, $4)
         ON CONFLICT (id) DO UPDATE SET handle = EXCLUDED.handle, display_name = EXCLUDED.display_name, updated_at = EXCLUDED.updated_at
         RETURNING ${USER_COLUMNS}`,
        [params.id, params.handle, params.displayName, params.now],
      );
      const row = rows[0];
      if (!row) throw new StorageError("upsertUser returned no row");
      return toUser(row);
    },

    async getUser(id) {
      const rows = await q(pool, "getUser", UserRow, `SELECT ${USER_COLUMNS} FROM users WHERE id = $1`, [id]);
      const row = rows[0];
      return row ? toUser(row) : null;
    },

    async replaceActiveChallenge(params) {
      return withTransaction("replaceActiveChallenge", async (client) => {
        // row lock serializes concurrent replacements for the same user
        const locked = await q(client, "replaceActiveChallenge", z.object({ id: z.string() }), "SELECT id FROM users WHERE id = $1 FOR UPDATE", [
          params.userId,
        ]);
        if (locked.length === 0) throw new UnknownUserError(params.userId);

        await q(client, "replaceActiveChallenge", NoRows, "UPDATE challenges SET active = FALSE WHERE user_id = $1 AND active", [
          params.userId,
        ]);

        const rows = await q(
          client,
          "replaceActiveChallenge",
          ChallengeRow,
          `INSERT INTO challenges (user_id, text, frequency, created_at, active)
           VALUES ($1, $2, $3, $4, TRUE)
           RETURNING ${CHALLENGE_COLUMNS}`,
          [params.userId, params.text, params.frequency, params.createdAt],
        );
        const row = rows[0];
        if (!row) throw new StorageError("replaceActiveChallenge inserted no row");
        return toChallenge(row);
      });
    },

    async listActiveChallenges(userId) {
      const rows = await q(
        pool,
        "listActiveChallenges",
        ChallengeRow,
        `SELECT ${CHALLENGE_COLUMNS} FROM challenges WHERE user_id = $1 AND active ORDER BY id ASC`,
        [userId],
      );
      return rows.map(toChallenge);
    },

    async listChallenges(userId) {
      const rows = await q(
        pool,
        "listChallenges",
        ChallengeRow,
        `SELECT ${CHALLENGE_COLUMNS} FROM challenges WHERE user_id = $1 ORDER BY id ASC`,
        [userId],
      );
      return rows.map(toChallenge);
    },

    async insertCompletion(params) {
      const rows = await q(
        pool,
        "insertCompletion",
        CompletionRow,
        `INSERT INTO completions (user_id, challenge_id, completed_at)
         VALUES ($1, $2, $3)
         RETURNING ${COMPLETION_COLUMNS}`,
        [params.userId, params.challengeId, params.completedAt],
      );
      const row = rows[0];
      if (!row) throw new StorageError("insertCompletion returned no row");
      return toCompletion(row);
    },

    async listCompletions(userId) {
      const rows = await q(
        pool,
        "listCompletions",
        CompletionRow,
        `SELECT ${COMPLETION_COLUMNS} FROM completions WHERE user_id = $1 ORDER BY id ASC`,
        [userId],
      );
      return rows.map(toCompletion);
    },

    async completionCountsSince(sinceIso) {
      // LEFT JOIN keeps users with no completions in the window
      const rows = await q(
        pool,
        "completionCountsSince",
        CountRow,
        `SELECT u.id AS user_id, u.handle, u.display_name, COUNT(c.id)::int AS completion_count
         FROM users u
         LEFT JOIN completions c ON c.user_id = u.id AND c.completed_at > $1
         GROUP BY u.id, u.handle, u.display_name, u.registered_seq
         ORDER BY completion_count DESC, u.registered_seq ASC`,
        [sinceIso],
      );
      return rows.map((r) => ({
        userId: r.user_id,
        handle: r.handle,
        displayName: r.display_name,
        count: r.completion_count,
      }));
    },

    async close() {
      await pool.end();
    },
  };
}

export function openStorage(config: AppConfig): Storage {
  if (config.storage.driver === "memory") {
    console.warn("⚠️ STORAGE=memory: data is lost when the process exits");
    return createMemoryStorage();
  }
  return createPgStorage(createPgPool({ connectionString: config.storage.databaseUrl, ssl: config.storage.ssl }));
}
