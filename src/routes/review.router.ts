// src/routes/review.router.ts
import express from "express";
import { ReviewController } from "../controllers/review.controller";
import { MethodNotAllowedError } from "../errors";

export const createReviewRouter = (controller: ReviewController) => {
  const router = express.Router();

  router.post("/", controller.create); // Create a review
  router.get("/", controller.list); // List reviews, ?sentiment=positive|negative|neutral
  router.all("/", (_req, res, next) => {
    res.set("Allow", "GET, POST");
    next(new MethodNotAllowedError());
  });

  return router;
};
