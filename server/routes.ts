import type { Express, NextFunction, Request, Response } from "express";
import { createServer, type Server } from "http";
import { DEFAULT_FILENAME, parseRequestSchema } from "@shared/schema";
import type { AppConfig } from "./config";
import { logger, errorMessage } from "./logger";
import type { LabReportParser } from "./services/lab-report-parser";

export const SERVICE_NAME = "lab-report-parser";
export const SERVICE_VERSION = "1.0.0";

export interface RouteDependencies {
  // null when the Document AI processor is not configured
  parser: LabReportParser | null;
  config: Pick<AppConfig, "webhookApiKey">;
}

function allowCors(res: Response): void {
  res.header("Access-Control-Allow-Origin", "*");
}

function isEmptyBody(body: unknown): boolean {
  return typeof body !== "object" || body === null || Object.keys(body).length === 0;
}

function isBodyParseError(error: unknown): boolean {
  return typeof error === "object" && error !== null && "type" in error && error.type === "entity.parse.failed";
}

export async function registerRoutes(app: Express, { parser, config }: RouteDependencies): Promise<Server> {
  app.get("/health", (_req, res) => {
    res.json({
      status: "healthy",
      service: SERVICE_NAME,
      processor_id: parser?.processorId ?? null,
      version: SERVICE_VERSION,
    });
  });

  // CORS preflight for browser-based automation tools
  app.options("/", (_req, res) => {
    allowCors(res);
    res.header("Access-Control-Allow-Methods", "POST, OPTIONS");
    res.header("Access-Control-Allow-Headers", "Content-Type, Authorization, X-API-Key");
    res.json({ status: "ok" });
  });

  // Parse a lab report PDF sent as base64
  app.post("/", async (req, res) => {
    try {
      if (isEmptyBody(req.body)) {
        return res.status(400).json({ status: "error", message: "No JSON data provided" });
      }

      const parsed = parseRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ status: "error", message: parsed.error.issues[0]?.message ?? "Invalid request" });
      }

      const expectedKey = config.webhookApiKey;
      if (expectedKey && req.get("X-API-Key") !== expectedKey) {
        return res.status(401).json({ status: "error", message: "Invalid or missing API key" });
      }

      const filename = parsed.data.filename ?? DEFAULT_FILENAME;
      if (!parser) {
        return res.status(503).json({
          status: "error",
          message: "Document AI processor is not configured",
          filename,
          data: null,
        });
      }

      logger.info(`[routes] Processing: ${filename}`);
      const result = await parser.processForWebhook(parsed.data.pdf_base64, filename);

      if (result.status === "success") {
        logger.info(`[routes] Success: ${result.extraction_stats.total_markers_found} markers extracted`);
      } else {
        logger.error(`[routes] Failed: ${result.message}`);
      }

      allowCors(res);
      res.json(result);
    } catch (error) {
      logger.error("[routes] Request processing failed:", error);
      res.status(500).json({ status: "error", message: `Server error: ${errorMessage(error)}` });
    }
  });

  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
    } else if (isBodyParseError(error)) {
      res.status(400).json({ status: "error", message: "Request body is not valid JSON" });
    } else {
      logger.error("[routes] Unhandled error:", error);
      res.status(500).json({ status: "error", message: `Server error: ${errorMessage(error)}` });
    }
  });

  const httpServer = createServer(app);
  return httpServer;
}
