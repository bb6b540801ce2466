import rateLimit from "express-rate-limit";
import type { ApiErrorResponse } from "@finhop/shared";
import { appConfig } from "../config.js";

const tooManyRequests: ApiErrorResponse = { error: "Too many requests, retry later" };

export const apiRateLimiter = rateLimit({
  windowMs: appConfig.RATE_LIMIT_WINDOW_MS,
  limit: appConfig.RATE_LIMIT_MAX,
  standardHeaders: "draft-7",
  legacyHeaders: false,
  message: tooManyRequests,
  // Health probes are not counted.
  skip: (req) => req.path === "/api/health"
});
