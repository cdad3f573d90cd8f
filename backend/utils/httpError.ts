export class HttpError extends Error {
  public statusCode: number;
  public code: string;
  public details?: unknown;

  constructor(statusCode: number, message: string, details?: unknown, code = "request_failed") {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

export const isHttpError = (error: unknown): error is HttpError => error instanceof HttpError;

export const notFound = (message: string): HttpError => new HttpError(404, message, undefined, "not_found");

export default HttpError;
