import { Status } from "google-gax";
import { describe, expect, it } from "vitest";
import { ExternalServiceError, ProcessingError, toExternalServiceError } from "../services/errors";
import { failedStages, runStage } from "../services/stages";

describe("runStage", () => {
  it("reports success", () => {
    expect(runStage("sort", () => undefined)).toEqual({ ok: true, stage: "sort" });
  });

  it("wraps a thrown error with its stage", () => {
    const outcome = runStage("patterns", () => {
      throw new TypeError("bad text");
    });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error).toBeInstanceOf(ProcessingError);
    expect(outcome.error.stage).toBe("patterns");
    expect(outcome.error.message).toBe("patterns failed: bad text");
    expect(outcome.error.cause).toBeInstanceOf(TypeError);
  });

  it("keeps a ProcessingError as thrown", () => {
    const error = new ProcessingError("tables", "table 2 unreadable");
    const outcome = runStage("tables", () => {
      throw error;
    });
    expect(outcome.ok ? null : outcome.error).toBe(error);
  });

  it("filters failed outcomes", () => {
    const outcomes = [
      runStage("entities", () => undefined),
      runStage("form_fields", () => {
        throw new Error("no pages");
      }),
    ];
    expect(failedStages(outcomes).map((failure) => failure.stage)).toEqual(["form_fields"]);
  });
});

describe("toExternalServiceError", () => {
  it("reads the gRPC code and flags transient failures", () => {
    const failure = toExternalServiceError(Object.assign(new Error("try again"), { code: Status.UNAVAILABLE }));
    expect(failure.code).toBe(Status.UNAVAILABLE);
    expect(failure.transient).toBe(true);
    expect(failure.notFound).toBe(false);
  });

  it("treats quota and permission errors as permanent", () => {
    expect(toExternalServiceError(Object.assign(new Error("quota"), { code: Status.RESOURCE_EXHAUSTED })).transient)
      .toBe(false);
    expect(toExternalServiceError(Object.assign(new Error("denied"), { code: Status.PERMISSION_DENIED })).transient)
      .toBe(false);
  });

  it("handles errors without a code", () => {
    const failure = toExternalServiceError("socket hang up");
    expect(failure.message).toBe("socket hang up");
    expect(failure.code).toBeUndefined();
    expect(failure.transient).toBe(false);
  });

  it("passes an ExternalServiceError through", () => {
    const failure = new ExternalServiceError("gone", Status.NOT_FOUND);
    expect(toExternalServiceError(failure)).toBe(failure);
    expect(failure.notFound).toBe(true);
  });
});
