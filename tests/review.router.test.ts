import { Server } from "http";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createApp } from "../src/app";
import { loadConfig } from "../src/config";
import { MemoryReviewStore } from "./helpers/memory.review.store";

describe("reviews HTTP API", () => {
  let store: MemoryReviewStore;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);

    store = new MemoryReviewStore();
    const app = createApp({ config: loadConfig({}), store });
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === "string") {
      throw new Error("server is not listening on a TCP port");
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) =>
      server.close((error) => (error ? reject(error) : resolve()))
    );
    vi.restoreAllMocks();
  });

  const postReview = (body: string) =>
    fetch(`${baseUrl}/reviews`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body,
    });

  it("creates a review with 201", async () => {
    const res = await postReview(JSON.stringify({ text: "Я люблю этот <b>продукт</b>" }));

    expect(res.status).toBe(201);
    expect(await res.json()).toEqual({
      id: 1,
      text: "Я люблю этот продукт",
      sentiment: "positive",
      created_at: expect.any(String),
    });
  });

  it("answers malformed JSON with 422", async () => {
    const res = await postReview('{"text": "Хорошо"');

    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({ detail: "Invalid request body" });
    expect(store.inserts).toBe(0);
  });

  it("answers an empty review with 422", async () => {
    const res = await postReview(JSON.stringify({ text: "   " }));

    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({ detail: "Invalid request body" });
  });

  it("lists reviews filtered by sentiment", async () => {
    await postReview(JSON.stringify({ text: "Хороший товар" }));
    await postReview(JSON.stringify({ text: "Плохой товар" }));

    const all = await fetch(`${baseUrl}/reviews`);
    expect(all.status).toBe(200);
    expect(await all.json()).toEqual([
      expect.objectContaining({ id: 1, sentiment: "positive" }),
      expect.objectContaining({ id: 2, sentiment: "negative" }),
    ]);

    const negative = await fetch(`${baseUrl}/reviews?sentiment=negative`);
    expect(negative.status).toBe(200);
    expect(await negative.json()).toEqual([
      expect.objectContaining({ id: 2, text: "Плохой товар", sentiment: "negative" }),
    ]);
  });

  it.each([["sentiment=happy"], ["sentiment="], ["sentiment=positive&sentiment=negative"]])(
    "rejects ?%s with 422",
    async (query) => {
      const res = await fetch(`${baseUrl}/reviews?${query}`);

      expect(res.status).toBe(422);
      expect(await res.json()).toEqual({ detail: "Invalid sentiment filter" });
    }
  );

  it("hides storage failures behind a generic 500", async () => {
    store.available = false;

    const res = await postReview(JSON.stringify({ text: "Хорошо" }));

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ detail: "Internal database error" });
  });

  it("answers unknown paths with 404", async () => {
    const res = await fetch(`${baseUrl}/nope`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ detail: "Not found" });
  });

  it("answers other methods on /reviews with 405", async () => {
    const res = await fetch(`${baseUrl}/reviews`, { method: "DELETE" });

    expect(res.status).toBe(405);
    expect(res.headers.get("allow")).toBe("GET, POST");
    expect(await res.json()).toEqual({ detail: "Method not allowed" });
  });

  it("reports health", async () => {
    const ok = await fetch(`${baseUrl}/health`);
    expect(ok.status).toBe(200);
    expect(await ok.json()).toEqual({ status: "ok" });

    store.available = false;
    const down = await fetch(`${baseUrl}/health`);
    expect(down.status).toBe(500);
    expect(await down.json()).toEqual({ detail: "Internal database error" });
  });
});
