import Database from "better-sqlite3";
import fs from "fs";
import path from "path";
import { TweetEntity } from "./types";

export interface StoredTweet {
  id: string;
  target: string;
  author: string | null;
  text: string;
  created_at: string | null;
  raw_json: string | null;
  seen_at: number;
}

export interface TweetQuery {
  target?: string;
  contains?: string;
  limit?: number;
}

export class Store {
  private db: Database.Database;
  private stmtInsertTweet!: Database.Statement;
  private stmtHasTweet!: Database.Statement<[string]>;
  private stmtGetCheckpoint!: Database.Statement<[string]>;
  private stmtSetCheckpoint!: Database.Statement;

  constructor(dbPath = path.join(process.cwd(), "data", "monitor.db")) {
    if (dbPath !== ":memory:") fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    this.db = new Database(dbPath);
    this.setup();
    this.prepareStatements();
  }

  private setup() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS tweets (
        id TEXT PRIMARY KEY,
        target TEXT NOT NULL,
        author TEXT,
        text TEXT NOT NULL,
        created_at TEXT,
        raw_json TEXT,
        seen_at INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS monitor_checkpoints (
        target TEXT PRIMARY KEY,
        last_checked_at INTEGER NOT NULL
      );
    `);
    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_tweets_target_seen ON tweets(target, seen_at DESC);
    `);
  }

  private prepareStatements() {
    // 推文只插入一次：首次发现的时间即 seen_at
    this.stmtInsertTweet = this.db.prepare(`
      INSERT INTO tweets (id, target, author, text, created_at, raw_json, seen_at)
      VALUES (@id, @target, @author, @text, @created_at, @raw_json, @seen_at)
      ON CONFLICT(id) DO NOTHING
    `);
    this.stmtHasTweet = this.db.prepare(`SELECT 1 FROM tweets WHERE id = ?`);
    this.stmtGetCheckpoint = this.db.prepare(`
      SELECT last_checked_at FROM monitor_checkpoints WHERE target = ?
    `);
    this.stmtSetCheckpoint = this.db.prepare(`
      INSERT INTO monitor_checkpoints (target, last_checked_at)
      VALUES (?, ?)
      ON CONFLICT(target) DO UPDATE SET last_checked_at=excluded.last_checked_at
    `);
  }

  /** Returns how many of the tweets were new. */
  saveTweets(tweets: TweetEntity[], seenAt = Date.now()): number {
    const insertMany = this.db.transaction((rows: TweetEntity[]) => {
      let inserted = 0;
      for (const t of rows) {
        const info = this.stmtInsertTweet.run({
          id: t.id,
          target: t.target.toLowerCase(),
          author: t.author ?? null,
          text: t.text,
          created_at: t.created_at ?? null,
          raw_json: t.raw_json ?? null,
          seen_at: seenAt,
        });
        inserted += info.changes;
      }
      return inserted;
    });
    return insertMany(tweets);
  }

  filterUnseen(ids: string[]): string[] {
    return ids.filter((id) => this.stmtHasTweet.get(id) === undefined);
  }

  getCheckpoint(target: string): number | undefined {
    const row = this.stmtGetCheckpoint.get(target.toLowerCase()) as { last_checked_at: number } | undefined;
    return row?.last_checked_at;
  }

  setCheckpoint(target: string, checkedAt: number) {
    this.stmtSetCheckpoint.run(target.toLowerCase(), checkedAt);
  }

  listTweets(query: TweetQuery = {}): StoredTweet[] {
    const where: string[] = [];
    const params: Record<string, string | number> = { limit: query.limit ?? 20 };
    if (query.target) {
      where.push("target = @target");
      params.target = query.target.replace(/^@/, "").toLowerCase();
    }
    if (query.contains) {
      where.push("text LIKE @contains");
      params.contains = `%${query.contains}%`;
    }
    const sql = `
      SELECT id, target, author, text, created_at, raw_json, seen_at
      FROM tweets
      ${where.length ? `WHERE ${where.join(" AND ")}` : ""}
      ORDER BY seen_at DESC, length(id) DESC, id DESC
      LIMIT @limit
    `;
    return this.db.prepare(sql).all(params) as StoredTweet[];
  }

  close() {
    this.db.close();
  }
}
