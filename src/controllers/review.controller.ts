// src/controllers/review.controller.ts
import { NextFunction, Request, Response } from "express";
import { ReviewService } from "../services/review.service";

export const createReviewController = (service: ReviewService) => ({
  // ============================
  // 1. Create a review
  // ============================
  async create(req: Request, res: Response, next: NextFunction) {
    try {
      const review = await service.create(req.body);
      console.log(`📝 Review #${review.id} stored as ${review.sentiment}`);
      res.status(201).json(review);
    } catch (error) {
      next(error);
    }
  },

  // ============================
  // 2. List reviews, optionally by sentiment
  // ============================
  async list(req: Request, res: Response, next: NextFunction) {
    try {
      const reviews = await service.list(req.query.sentiment);
      res.status(200).json(reviews);
    } catch (error) {
      next(error);
    }
  },
});

export type ReviewController = ReturnType<typeof createReviewController>;
