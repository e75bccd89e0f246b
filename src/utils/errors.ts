// Standardized error handling utilities

export enum ErrorCode {
  NOT_FOUND = 'not_found',
  BAD_REQUEST = 'bad_request',
  INTERNAL_ERROR = 'internal_error',
  VALIDATION_ERROR = 'validation_error',
  SERVICE_UNAVAILABLE = 'service_unavailable',
  TOOL_DEFINITION = 'tool_definition',
  DUPLICATE_TOOL = 'duplicate_tool',
  PROVIDER_ERROR = 'provider_error',
}

export class AppError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public statusCode: number = 500,
    public details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
  }

  static notFound(message: string = 'Resource not found', details?: unknown): AppError {
    return new AppError(ErrorCode.NOT_FOUND, message, 404, details);
  }

  static badRequest(message: string = 'Bad request', details?: unknown): AppError {
    return new AppError(ErrorCode.BAD_REQUEST, message, 400, details);
  }

  static validationError(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.VALIDATION_ERROR, message, 400, details);
  }

  static unavailable(message: string = 'Service unavailable', details?: unknown): AppError {
    return new AppError(ErrorCode.SERVICE_UNAVAILABLE, message, 503, details);
  }

  static internal(message: string = 'Internal server error', details?: unknown): AppError {
    return new AppError(ErrorCode.INTERNAL_ERROR, message, 500, details);
  }
}

// Raised at registration time; a tool must declare a name
export class ToolDefinitionError extends AppError {
  constructor(message: string) {
    super(ErrorCode.TOOL_DEFINITION, message, 500);
    this.name = 'ToolDefinitionError';
  }
}

export class DuplicateToolError extends AppError {
  constructor(public toolName: string) {
    super(ErrorCode.DUPLICATE_TOOL, `Tool "${toolName}" is already registered`, 500);
    this.name = 'DuplicateToolError';
  }
}

// Non-2xx or malformed answers from a completion provider
export class ProviderError extends AppError {
  constructor(
    public provider: string,
    message: string,
    public status?: number
  ) {
    super(ErrorCode.PROVIDER_ERROR, message, 502, status === undefined ? undefined : { status });
    this.name = 'ProviderError';
  }
}

export interface ErrorResponse {
  error: ErrorCode;
  message: string;
  statusCode: number;
  details?: unknown;
}

export function formatErrorResponse(error: AppError, includeDetails: boolean = false): ErrorResponse {
  const response: ErrorResponse = {
    error: error.code,
    message: error.message,
    statusCode: error.statusCode,
  };

  if (includeDetails && error.details) {
    response.details = error.details;
  }

  return response;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
