import { describe, expect, it } from "vitest";
import { loadConfig } from "../config";

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    expect(loadConfig({})).toEqual({
      port: 8080,
      documentAI: {
        projectId: undefined,
        location: "eu",
        processorId: undefined,
        fallbackProcessorId: undefined,
        credentials: undefined,
        retryDeadlineMs: 60_000,
      },
      referenceCatalogPath: "data/reference-values.csv",
      webhookApiKey: undefined,
      maxPagesPerRequest: 15,
    });
  });

  it("reads processor settings and numeric overrides", () => {
    const config = loadConfig({
      PORT: "3000",
      GOOGLE_CLOUD_PROJECT_ID: "test-project",
      GOOGLE_CLOUD_LOCATION: "us",
      GOOGLE_DOCUMENT_AI_PROCESSOR_ID: "primary",
      GOOGLE_DOCUMENT_AI_FALLBACK_PROCESSOR_ID: "backup",
      MAX_PAGES_PER_REQUEST: "10",
    });

    expect(config.port).toBe(3000);
    expect(config.documentAI).toMatchObject({
      projectId: "test-project",
      location: "us",
      processorId: "primary",
      fallbackProcessorId: "backup",
    });
    expect(config.maxPagesPerRequest).toBe(10);
  });

  it("treats empty strings as unset", () => {
    expect(loadConfig({ WEBHOOK_API_KEY: "" }).webhookApiKey).toBeUndefined();
  });

  it("parses inline service account credentials", () => {
    const config = loadConfig({
      GOOGLE_APPLICATION_CREDENTIALS_JSON: JSON.stringify({
        client_email: "parser@test-project.invalid",
        private_key: "test-secret",
      }),
    });
    expect(config.documentAI.credentials).toEqual({
      client_email: "parser@test-project.invalid",
      private_key: "test-secret",
    });
  });

  it("ignores credentials that are not valid JSON", () => {
    expect(loadConfig({ GOOGLE_APPLICATION_CREDENTIALS_JSON: "{not json" }).documentAI.credentials).toBeUndefined();
  });

  it("rejects malformed numbers", () => {
    expect(() => loadConfig({ PORT: "not-a-port" })).toThrow(/^Invalid configuration: PORT/);
  });
});
