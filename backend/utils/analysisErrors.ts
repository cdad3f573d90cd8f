import HttpError from "./httpError";

/** The model service is down, timed out, or answered with a non-success status. */
export class AIServiceError extends HttpError {
  constructor(message: string, details?: unknown) {
    super(503, message, details, "ai_unavailable");
  }
}

/** A run could not be carried to completion. */
export class AnalysisError extends HttpError {
  constructor(message: string, details?: unknown) {
    super(500, message, details, "analysis_failed");
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
