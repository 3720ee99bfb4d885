/**
 * Health Check Routes
 *
 * Liveness for load balancers and a database connectivity probe.
 */

import type { Express, Request, Response } from "express";
import { checkDatabaseConnection } from "../db";
import { asyncHandler } from "../middleware/errorHandler";
import { createApiSuccessResponse, createApiErrorResponse, ERROR_CODES } from "@shared/errors";
import { HTTP_STATUS } from "../config/constants";

export function registerHealthRoutes(app: Express): void {
  /**
   * GET /api/health
   *
   * Returns 200 OK immediately if the server is running.
   */
  app.get("/api/health", asyncHandler(async (_req: Request, res: Response) => {
    res.status(HTTP_STATUS.OK).json(createApiSuccessResponse({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime()
    }, 'Service is running'));
  }));

  /**
   * GET /api/health/database
   *
   * 503 when the database is unreachable or not configured.
   */
  app.get("/api/health/database", asyncHandler(async (_req: Request, res: Response) => {
    const isConnected = await checkDatabaseConnection();

    if (!isConnected) {
      res.status(HTTP_STATUS.SERVICE_UNAVAILABLE).json(createApiErrorResponse(
        'DATABASE_ERROR',
        ERROR_CODES.DATABASE_ERROR,
        'Database connection failed',
        'The database is not reachable; summaries are computed but not stored.'
      ));
      return;
    }

    res.json(createApiSuccessResponse({
      status: 'connected',
      timestamp: new Date().toISOString()
    }));
  }));
}
