import type { RequestHandler } from "express";
import { logger } from "../utils/logger.js";

export const requestLogger: RequestHandler = (req, res, next) => {
  const startTime = Date.now();

  res.on("finish", () => {
    const durationMs = Date.now() - startTime;
    const payload = {
      method: req.method,
      url: req.originalUrl,
      statusCode: res.statusCode,
      durationMs
    };
    if (res.statusCode >= 500) {
      logger.warn(payload, "HTTP request failed");
      return;
    }
    logger.info(payload, "HTTP request");
  });

  next();
};
