import { logger, errorMessage } from "../logger";
import { ProcessingError, type ExtractionStage, type PostProcessingStage } from "./errors";

export type IsolatedStage = ExtractionStage | PostProcessingStage;

export interface StageFailure {
  ok: false;
  stage: IsolatedStage;
  error: ProcessingError;
}

export type StageOutcome = { ok: true; stage: IsolatedStage } | StageFailure;

/**
 * Runs one pipeline stage in isolation. A throwing stage is logged and reported
 * as a failed outcome; whatever it already wrote to the result is kept.
 */
export function runStage(stage: IsolatedStage, work: () => void): StageOutcome {
  try {
    work();
    return { ok: true, stage };
  } catch (error) {
    const wrapped = error instanceof ProcessingError
      ? error
      : new ProcessingError(stage, `${stage} failed: ${errorMessage(error)}`, { cause: error });
    logger.warn(`[pipeline] Stage "${stage}" failed, continuing:`, wrapped.message);
    return { ok: false, stage, error: wrapped };
  }
}

export function failedStages(outcomes: readonly StageOutcome[]): StageFailure[] {
  return outcomes.filter((outcome): outcome is StageFailure => !outcome.ok);
}
