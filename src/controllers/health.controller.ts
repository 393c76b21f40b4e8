// src/controllers/health.controller.ts
import { NextFunction, Request, Response } from "express";
import { ReviewStore } from "../store/review.store";

export const createHealthController = (store: ReviewStore) => ({
  async check(_req: Request, res: Response, next: NextFunction) {
    try {
      await store.ping();
      res.status(200).json({ status: "ok" });
    } catch (error) {
      next(error);
    }
  },
});
