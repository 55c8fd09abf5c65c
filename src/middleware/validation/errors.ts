import type { Request, Response, NextFunction } from 'express';

export type ErrorResponseBody = {
  error: string;
  code?: string;
  details?: unknown;
};

export type ErrorResponse = { status: number; body: ErrorResponseBody };

/**
 * Service error codes (the error message) mapped to HTTP responses
 */
export type ErrorHandlerMap = Record<string, (error: Error) => ErrorResponse>;

/**
 * Create a standardized error response
 */
export function createErrorResponse(status: number, message: string, code?: string, details?: unknown): ErrorResponse {
  return {
    status,
    body: { error: message, ...(code ? { code } : {}), ...(details !== undefined ? { details } : {}) }
  };
}

function errorDetails(error: Error): unknown {
  return 'details' in error ? error.details : undefined;
}

/**
 * Wraps an async route handler. Errors whose message appears in the map get
 * the mapped response; anything else is logged and answered with a 500.
 */
export function asyncErrorHandler(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<unknown> | unknown,
  errorMap: ErrorHandlerMap = replenishmentErrorMap
) {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      await handler(req, res, next);
    } catch (error: unknown) {
      if (error instanceof Error && errorMap[error.message]) {
        const mapped = errorMap[error.message](error);
        res.locals.errorCode = error.message;
        res.status(mapped.status).json(mapped.body);
        return;
      }

      console.error(error);
      res.status(500).json({
        error: 'An internal server error occurred.',
        ...(process.env.NODE_ENV === 'development' && error instanceof Error && { details: error.message })
      });
    }
  };
}

const mapWithDetails =
  (status: number, message: string) =>
  (error: Error): ErrorResponse =>
    createErrorResponse(status, message, error.message, errorDetails(error));

/**
 * Replenishment domain and planning board error mappings
 */
export const replenishmentErrorMap: ErrorHandlerMap = {
  INVALID_PARAMETER: mapWithDetails(400, 'Invalid replenishment parameters.'),
  DEMAND_FILE_TOO_LARGE: mapWithDetails(413, 'Demand file exceeds size limit.'),
  DEMAND_ROW_LIMIT: mapWithDetails(413, 'Demand file exceeds row limit.'),
  DEMAND_NO_HEADERS: mapWithDetails(400, 'Demand file must include a header row.'),
  DEMAND_MISSING_COLUMNS: mapWithDetails(400, 'Demand file is missing required columns.'),
  DEMAND_NOT_LOADED: mapWithDetails(409, 'Upload a demand file before adding products.'),
  PRODUCT_NOT_IN_CATALOG: mapWithDetails(404, 'SKU is not in the uploaded demand file.'),
  PRODUCT_ALREADY_ADDED: mapWithDetails(409, 'Product with this SKU is already added.'),
  PRODUCT_NOT_FOUND: mapWithDetails(404, 'Product not found.'),
  SCHEDULE_EVENT_NOT_FOUND: mapWithDetails(404, 'Schedule event not found.')
};
