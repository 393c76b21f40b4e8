// src/middlewares/request.logger.ts
import { NextFunction, Request, Response } from "express";

export const requestLogger = (req: Request, _res: Response, next: NextFunction) => {
  console.log("👉 Request:", req.method, req.url);
  next();
};
