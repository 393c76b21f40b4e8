// src/services/review.service.ts
import { AppConfig } from "../config";
import { ValidationError } from "../errors";
import { Review } from "../model/review.model";
import { ReviewStore } from "../store/review.store";
import {
  parseSentimentFilter,
  reviewCreateRules,
  ReviewCreateRules,
  validateReviewCreate,
} from "../validation/review.validation";
import { SentimentClassifier } from "./sentiment.classifier";
import { sanitize } from "./text.sanitizer";

export interface ReviewServiceDeps {
  store: ReviewStore;
  config: Pick<AppConfig, "maxReviewLength" | "sentimentRules">;
  now?: () => Date;
}

export class ReviewService {
  private readonly store: ReviewStore;
  private readonly classifier: SentimentClassifier;
  private readonly rules: ReviewCreateRules;
  private readonly now: () => Date;

  constructor({ store, config, now = () => new Date() }: ReviewServiceDeps) {
    this.store = store;
    this.classifier = new SentimentClassifier(config.sentimentRules);
    this.rules = reviewCreateRules(config.maxReviewLength);
    this.now = now;
  }

  async create(body: unknown): Promise<Review> {
    const raw = validateReviewCreate(body, this.rules);

    // Markup-only input leaves nothing to store.
    const text = sanitize(raw).trim();
    if (!text) throw new ValidationError();

    const sentiment = this.classifier.classify(text);
    const created_at = this.now().toISOString();
    const id = await this.store.insert(text, sentiment, created_at);

    return { id, text, sentiment, created_at };
  }

  async list(sentiment: unknown): Promise<Review[]> {
    const filter = parseSentimentFilter(sentiment);
    return this.store.list(filter);
  }
}
