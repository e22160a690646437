import express, { type NextFunction, type Request, type RequestHandler, type Response } from "express";
import cors from "cors";
import rateLimit from "express-rate-limit";
import type { Server } from "node:http";
import { timingSafeEqual } from "node:crypto";
import { createRouter, type RouteDeps } from "./routes.js";
import { requestLogger, logRest } from "../logging.js";

export interface AppDeps extends RouteDeps {
  /** Empty disables authentication */
  readonly apiKey: string;
}

function apiKeyAuth(key: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!key) {
      next();
      return;
    }
    const provided = req.get("x-api-key") ?? req.get("authorization")?.replace(/^Bearer\s+/i, "");
    const providedBuffer = Buffer.from(provided ?? "");
    const keyBuffer = Buffer.from(key);

    if (providedBuffer.length === keyBuffer.length && timingSafeEqual(providedBuffer, keyBuffer)) {
      next();
    } else {
      res.status(401).json({ error: "Unauthorized: invalid or missing API key" });
    }
  };
}

// Keyed by API key, not IP
const keyGenerator = (req: Request): string => req.get("x-api-key") ?? "anonymous";

// Suppress express-rate-limit IPv6 validation (we key by API key, not IP)
const rlOptions = { validate: { ip: false } } as const;

const startTime = Date.now();

export function createApp(deps: AppDeps): express.Express {
  const app = express();

  const globalLimiter = rateLimit({
    windowMs: 60_000, // 1 minute
    max: 100,
    standardHeaders: true,
    legacyHeaders: false,
    keyGenerator,
    message: { error: "Rate limit exceeded — 100 requests/minute" },
    ...rlOptions,
  });

  app.use(cors());
  app.use(express.json());
  app.use(requestLogger);

  // Health check (unauthenticated)
  app.get("/", (_req, res) => {
    res.json({
      name: "equity-analytics-pipeline",
      version: "1.0.0",
      api: "/api/status",
      uptime_seconds: Math.floor((Date.now() - startTime) / 1000),
    });
  });

  app.use("/api", apiKeyAuth(deps.apiKey), globalLimiter, createRouter(deps));

  return app;
}

export function startRestServer(deps: AppDeps, port: number): Promise<Server> {
  return new Promise((resolve) => {
    const app = createApp(deps);

    const httpServer = app.listen(port, () => {
      logRest.info({ port }, "REST server listening");
      if (deps.apiKey) {
        logRest.info("API key authentication enabled");
      } else {
        logRest.warn("No REST_API_KEY set — endpoints are unauthenticated");
      }
      resolve(httpServer);
    });
  });
}
