import { createApp } from "./app";
import { loadConfig } from "./config";
import { createDb } from "./database";
import { MysqlReviewStore } from "./store/review.store";

const start = async () => {
  const config = loadConfig();
  const db = createDb(config.dbPath);
  const store = new MysqlReviewStore(db);

  await store.ping();
  console.log("Connected to MySQL");
  await store.init();
  console.log("📂 Table `reviews` ready");

  const app = createApp({ config, store });
  const server = app.listen(config.port, () => {
    console.log(`🚀 Server running at http://localhost:${config.port}`);
  });

  const shutdown = () => {
    server.close(() => {
      db.end()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          console.error("Error closing the MySQL pool:", error);
          process.exit(1);
        });
    });
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
};

start().catch((error: unknown) => {
  console.error("Failed to start server:", error instanceof Error && error.cause ? error.cause : error);
  process.exit(1);
});
