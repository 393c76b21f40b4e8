// src/app.ts
import express from "express";
import cors from "cors";
import { AppConfig } from "./config";
import { createHealthController } from "./controllers/health.controller";
import { createReviewController } from "./controllers/review.controller";
import { errorHandler, notFoundHandler } from "./middlewares/error.middleware";
import { requestLogger } from "./middlewares/request.logger";
import { createReviewRouter } from "./routes/review.router";
import { ReviewService } from "./services/review.service";
import { ReviewStore } from "./store/review.store";

export interface AppDeps {
  config: Readonly<AppConfig>;
  store: ReviewStore;
}

export const createApp = ({ config, store }: AppDeps) => {
  const app = express();

  app.use(
    cors({
      origin: config.corsOrigin,
      methods: ["GET", "POST", "OPTIONS"],
      allowedHeaders: ["Content-Type"],
    })
  );
  app.use(express.json());
  app.use(requestLogger);

  const health = createHealthController(store);
  app.get("/health", health.check);

  const service = new ReviewService({ store, config });
  app.use("/reviews", createReviewRouter(createReviewController(service)));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
