import { z } from "zod";
import { logger } from "./logger";

const serviceAccountSchema = z.object({
  client_email: z.string(),
  private_key: z.string(),
  project_id: z.string().optional(),
});

export type ServiceAccountCredentials = z.infer<typeof serviceAccountSchema>;

const emptyToUndefined = (value: unknown) => (value === "" ? undefined : value);

const optionalString = z.preprocess(emptyToUndefined, z.string().trim().min(1).optional());

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8080),
  GOOGLE_CLOUD_PROJECT_ID: optionalString,
  GOOGLE_CLOUD_LOCATION: z.string().trim().min(1).default("eu"),
  GOOGLE_DOCUMENT_AI_PROCESSOR_ID: optionalString,
  GOOGLE_DOCUMENT_AI_FALLBACK_PROCESSOR_ID: optionalString,
  GOOGLE_APPLICATION_CREDENTIALS_JSON: optionalString,
  REFERENCE_CATALOG_PATH: z.string().trim().min(1).default("data/reference-values.csv"),
  WEBHOOK_API_KEY: optionalString,
  DOCUMENT_AI_RETRY_DEADLINE_MS: z.coerce.number().int().positive().default(60_000),
  MAX_PAGES_PER_REQUEST: z.coerce.number().int().positive().default(15),
});

export interface AppConfig {
  port: number;
  documentAI: {
    projectId?: string;
    location: string;
    processorId?: string;
    fallbackProcessorId?: string;
    credentials?: ServiceAccountCredentials;
    retryDeadlineMs: number;
  };
  referenceCatalogPath: string;
  webhookApiKey?: string;
  maxPagesPerRequest: number;
}

// Without inline credentials the client falls back to Application Default Credentials
function parseCredentials(json: string | undefined): ServiceAccountCredentials | undefined {
  if (!json) return undefined;

  try {
    const parsed = serviceAccountSchema.safeParse(JSON.parse(json));
    if (parsed.success) return parsed.data;
    logger.error("[config] GOOGLE_APPLICATION_CREDENTIALS_JSON is missing client_email or private_key");
  } catch (error) {
    logger.error("[config] GOOGLE_APPLICATION_CREDENTIALS_JSON is not valid JSON:", error);
  }
  return undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join("; ")}`);
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    documentAI: {
      projectId: vars.GOOGLE_CLOUD_PROJECT_ID,
      location: vars.GOOGLE_CLOUD_LOCATION,
      processorId: vars.GOOGLE_DOCUMENT_AI_PROCESSOR_ID,
      fallbackProcessorId: vars.GOOGLE_DOCUMENT_AI_FALLBACK_PROCESSOR_ID,
      credentials: parseCredentials(vars.GOOGLE_APPLICATION_CREDENTIALS_JSON),
      retryDeadlineMs: vars.DOCUMENT_AI_RETRY_DEADLINE_MS,
    },
    referenceCatalogPath: vars.REFERENCE_CATALOG_PATH,
    webhookApiKey: vars.WEBHOOK_API_KEY,
    maxPagesPerRequest: vars.MAX_PAGES_PER_REQUEST,
  };
}
