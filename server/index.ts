import express, { type NextFunction, type Request, type Response } from "express";
import { loadConfig } from "./config";
import { logger } from "./logger";
import { registerRoutes } from "./routes";
import { createDocumentAIService } from "./services/document-ai";
import { LabReportParser } from "./services/lab-report-parser";
import { loadReferenceCatalog } from "./services/reference-catalog";

const config = loadConfig();

const app = express();
// Base64 PDFs run to tens of megabytes
app.use(express.json({ limit: "50mb" }));

app.use((req: Request, res: Response, next: NextFunction) => {
  const start = Date.now();
  res.on("finish", () => {
    logger.info(`[express] ${req.method} ${req.path} ${res.statusCode} in ${Date.now() - start}ms`);
  });
  next();
});

(async () => {
  const referenceCatalog = await loadReferenceCatalog(config.referenceCatalogPath);

  const documentAI = createDocumentAIService(config);
  if (documentAI) {
    await documentAI.resolveActiveProcessor();
  }

  const parser = documentAI
    ? new LabReportParser({
      processor: documentAI,
      referenceCatalog,
      maxPagesPerRequest: config.maxPagesPerRequest,
    })
    : null;

  const server = await registerRoutes(app, { parser, config });

  server.listen({ port: config.port, host: "0.0.0.0" }, () => {
    logger.info(`[express] serving on port ${config.port}`);
  });
})().catch((error: unknown) => {
  logger.error("[express] Failed to start server:", error);
  process.exitCode = 1;
});
