import express, { type Express } from "express";
import type { Server } from "http";
import { registerRoutes } from "./routes";
import type { VatSummaryRouteDeps } from "./routes/vat-summary-routes";
import { errorHandler } from "./middleware/errorHandler";
import { logger } from "./services/logger";

function newRequestId(): string {
  return Date.now().toString(36) + Math.random().toString(36).slice(2);
}

/**
 * Express app with middleware, routes and the error handler in place.
 * The returned server is not listening yet.
 */
export function createApp(overrides: Partial<VatSummaryRouteDeps> = {}): { app: Express; server: Server } {
  const app = express();

  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: false }));

  // Request ID for error tracking
  app.use((req, res, next) => {
    const requestId = req.get('x-request-id') || newRequestId();
    req.headers['x-request-id'] = requestId;
    res.setHeader('X-Request-ID', requestId);
    next();
  });

  // Request logging
  app.use((req, res, next) => {
    const start = Date.now();
    const path = req.path;

    res.on("finish", () => {
      if (!path.startsWith("/api")) return;
      const status = res.statusCode >= 400 ? '❌' : '✅';
      logger.info('http', `${status} ${req.method} ${path} ${res.statusCode} in ${Date.now() - start}ms`, {
        requestId: req.get('x-request-id'),
      });
    });

    next();
  });

  const server = registerRoutes(app, overrides);
  app.use(errorHandler);

  return { app, server };
}
