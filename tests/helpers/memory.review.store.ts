import { StorageError } from "../../src/errors";
import { Review, Sentiment } from "../../src/model/review.model";
import { ReviewStore } from "../../src/store/review.store";

// In-process stand-in for the MySQL store.
export class MemoryReviewStore implements ReviewStore {
  private readonly rows: Review[] = [];
  private nextId = 1;
  available = true;
  inserts = 0;

  async init() {
    this.assertAvailable();
  }

  async ping() {
    this.assertAvailable();
  }

  async insert(text: string, sentiment: Sentiment, createdAt: string) {
    this.assertAvailable();
    // Yield once so concurrent callers interleave like real I/O.
    await Promise.resolve();
    const id = this.nextId++;
    this.rows.push({ id, text, sentiment, created_at: createdAt });
    this.inserts++;
    return id;
  }

  async list(filter?: Sentiment) {
    this.assertAvailable();
    return this.rows
      .filter((row) => filter === undefined || row.sentiment === filter)
      .map((row) => ({ ...row }));
  }

  private assertAvailable() {
    if (!this.available) {
      throw new StorageError(new Error("ECONNREFUSED 127.0.0.1:3306"));
    }
  }
}
