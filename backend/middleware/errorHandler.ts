import { ErrorRequestHandler } from "express";
import { ZodError } from "zod";
import logger from "../utils/logger";
import { isHttpError } from "../utils/httpError";

const errorHandler: ErrorRequestHandler = (err, req, res, _next) => {
  if (err instanceof ZodError) {
    return res.status(422).json({
      error: "validation_error",
      message: "Request validation failed",
      details: err.flatten(),
    });
  }

  if (isHttpError(err)) {
    if (err.statusCode >= 500) {
      logger.warn({ path: req.path, code: err.code, error: err.message }, "Request failed");
    }
    return res.status(err.statusCode).json({
      error: err.code,
      message: err.message,
      ...(err.details !== undefined ? { details: err.details } : {}),
    });
  }

  logger.error(
    {
      path: req.path,
      method: req.method,
      error: err instanceof Error ? err.message : String(err),
      stack: err instanceof Error ? err.stack : undefined,
    },
    "Unhandled error"
  );

  res.status(500).json({ error: "internal_error", message: "Internal server error" });
};

export default errorHandler;
