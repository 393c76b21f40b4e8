// src/store/review.store.ts
import { Db, DbConnection, SqlValue, withConnection } from "../database";
import { StorageError } from "../errors";
import { isSentiment, Review, Sentiment } from "../model/review.model";

export interface ReviewStore {
  init(): Promise<void>;
  ping(): Promise<void>;
  /** Resolves with the new id once the row is committed. */
  insert(text: string, sentiment: Sentiment, createdAt: string): Promise<number>;
  /** Ordered by id ascending; all reviews when `filter` is undefined. */
  list(filter?: Sentiment): Promise<Review[]>;
}

const CREATE_TABLE = `
  CREATE TABLE IF NOT EXISTS reviews (
    id INT AUTO_INCREMENT PRIMARY KEY,
    \`text\` TEXT NOT NULL,
    sentiment VARCHAR(10) NOT NULL,
    created_at VARCHAR(40) NOT NULL,
    INDEX idx_reviews_sentiment (sentiment)
  ) DEFAULT CHARSET=utf8mb4`;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const toReview = (row: unknown): Review => {
  if (!isRecord(row)) throw new Error("Malformed row in reviews table");

  const { id, text, sentiment, created_at } = row;
  if (
    typeof id !== "number" ||
    typeof text !== "string" ||
    !isSentiment(sentiment) ||
    typeof created_at !== "string"
  ) {
    throw new Error("Malformed row in reviews table");
  }
  return { id, text, sentiment, created_at };
};

export class MysqlReviewStore implements ReviewStore {
  constructor(private readonly db: Db) {}

  // Every driver failure leaves this class as a StorageError.
  private async run<T>(work: (conn: DbConnection) => Promise<T>): Promise<T> {
    try {
      return await withConnection(this.db, work);
    } catch (error) {
      throw new StorageError(error);
    }
  }

  init() {
    return this.run(async (conn) => {
      await conn.execute(CREATE_TABLE, []);
    });
  }

  ping() {
    return this.run(async (conn) => {
      await conn.execute("SELECT 1", []);
    });
  }

  insert(text: string, sentiment: Sentiment, createdAt: string) {
    return this.run(async (conn) => {
      const [result] = await conn.execute(
        "INSERT INTO reviews (`text`, sentiment, created_at) VALUES (?, ?, ?)",
        [text, sentiment, createdAt]
      );
      const insertId = isRecord(result) ? result.insertId : undefined;
      if (typeof insertId !== "number") {
        throw new Error("INSERT returned no insertId");
      }
      return insertId;
    });
  }

  list(filter?: Sentiment) {
    return this.run(async (conn) => {
      let sql = "SELECT id, `text`, sentiment, created_at FROM reviews";
      const params: SqlValue[] = [];
      if (filter) {
        sql += " WHERE sentiment = ?";
        params.push(filter);
      }
      sql += " ORDER BY id ASC";

      const [rows] = await conn.execute(sql, params);
      if (!Array.isArray(rows)) {
        throw new Error("SELECT returned no rows array");
      }
      return rows.map(toReview);
    });
  }
}
