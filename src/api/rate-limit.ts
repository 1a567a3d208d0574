import rateLimit from "express-rate-limit";
import type { AppConfig } from "../config.js";

export function makeRateLimiter(opts: AppConfig["rateLimit"]) {
  return rateLimit({
    windowMs: opts.windowMs,
    limit: opts.max,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: "Too many requests, please try again later." }
  });
}
