/**
 * Standardized response envelopes shared by every endpoint.
 */

export interface FieldError {
  path: string;
  message: string;
}

export interface ErrorResponse {
  success: false;
  message: string;
  errors?: FieldError[];
  code?: string;
  correlationId?: string;
}

export interface SuccessResponse<T> {
  success: true;
  data: T;
}

export function createErrorResponse(
  message: string,
  errors?: FieldError[],
  code?: string,
  correlationId?: string,
): ErrorResponse {
  return {
    success: false,
    message,
    ...(errors && errors.length > 0 && { errors }),
    ...(code && { code }),
    ...(correlationId && { correlationId }),
  };
}

export function createSuccessResponse<T>(data: T): SuccessResponse<T> {
  return {
    success: true,
    data,
  };
}
