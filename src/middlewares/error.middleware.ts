// src/middlewares/error.middleware.ts
import { NextFunction, Request, Response } from "express";
import { AppError, NotFoundError } from "../errors";

export interface ErrorResponse {
  status: number;
  body: { detail: string };
}

// body-parser tags its errors with `type` ("entity.parse.failed", "entity.too.large", ...)
const isBodyParserError = (error: unknown): boolean =>
  typeof error === "object" &&
  error !== null &&
  "type" in error &&
  typeof error.type === "string" &&
  "status" in error &&
  typeof error.status === "number" &&
  error.status >= 400 &&
  error.status < 500;

export const toErrorResponse = (error: unknown): ErrorResponse => {
  if (error instanceof AppError) {
    return { status: error.status, body: { detail: error.detail } };
  }
  if (isBodyParserError(error)) {
    return { status: 422, body: { detail: "Invalid request body" } };
  }
  return { status: 500, body: { detail: "Internal server error" } };
};

export const notFoundHandler = (_req: Request, _res: Response, next: NextFunction) => {
  next(new NotFoundError());
};

// Express tells error middleware apart by its four parameters.
export const errorHandler = (
  error: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  const { status, body } = toErrorResponse(error);

  if (status >= 500) {
    console.error(`❌ ${req.method} ${req.originalUrl} failed:`, error);
  } else {
    console.warn(`⚠️ ${req.method} ${req.originalUrl} → ${status}: ${body.detail}`);
  }

  res.status(status).json(body);
};
