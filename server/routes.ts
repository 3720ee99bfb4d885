import type { Express } from "express";
import { createServer, type Server } from "http";
import { PIPELINE_CONFIG } from "./config";
import { storage } from "./storage";
import { registerHealthRoutes } from "./routes/health-routes";
import { createVatSummaryRouter, type VatSummaryRouteDeps } from "./routes/vat-summary-routes";
import { VatReportPublisher } from "./services/vat-summary/report-publisher";
import { VatSummaryPipeline } from "./services/vat-summary/vat-summary-pipeline";

export function createRouteDependencies(overrides: Partial<VatSummaryRouteDeps> = {}): VatSummaryRouteDeps {
  const routeStorage = overrides.storage ?? storage;
  return {
    storage: routeStorage,
    pipeline: overrides.pipeline ?? new VatSummaryPipeline(),
    publisher: overrides.publisher ?? new VatReportPublisher({
      storage: routeStorage,
      exportDir: PIPELINE_CONFIG.exportDir,
    }),
  };
}

export function registerRoutes(app: Express, overrides: Partial<VatSummaryRouteDeps> = {}): Server {
  registerHealthRoutes(app);
  app.use("/api/vat-summary", createVatSummaryRouter(createRouteDependencies(overrides)));

  return createServer(app);
}
