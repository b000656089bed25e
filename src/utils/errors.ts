// This module provides typed application errors that map into JSON-RPC error objects and HTTP responses.

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly details?: unknown;

  public constructor(statusCode: number, code: string, message: string, details?: unknown) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

// Raised when a request body is not JSON or not a JSON-RPC envelope.
export class MalformedRequestError extends AppError {
  // The id is echoed when it could be read from an otherwise invalid envelope.
  public readonly requestId: string | number | null;

  public constructor(
    code: 'parse_error' | 'invalid_request',
    message: string,
    details?: unknown,
    requestId: string | number | null = null
  ) {
    super(400, code, message, details);
    this.name = 'MalformedRequestError';
    this.requestId = requestId;
  }
}

export class MethodNotFoundError extends AppError {
  public constructor(method: string) {
    super(404, 'method_not_found', `Unknown method: ${method}`);
    this.name = 'MethodNotFoundError';
  }
}

export class InvalidParamsError extends AppError {
  public constructor(message: string, details?: unknown) {
    super(400, 'invalid_params', message, details);
    this.name = 'InvalidParamsError';
  }
}

export class UnknownToolError extends AppError {
  public constructor(toolName: string) {
    super(404, 'tool_not_found', `Unknown tool: ${toolName}`);
    this.name = 'UnknownToolError';
  }
}

export class DuplicateToolError extends AppError {
  public constructor(toolName: string) {
    super(409, 'duplicate_tool', `Tool already registered: ${toolName}`);
    this.name = 'DuplicateToolError';
  }
}

export class NotInitializedError extends AppError {
  public constructor() {
    super(409, 'not_initialized', 'Server has not been initialized. Call initialize first.');
    this.name = 'NotInitializedError';
  }
}

// Raised when a tool handler fails, rejects its arguments, or runs past its time budget.
export class ToolExecutionError extends AppError {
  public constructor(message: string, details?: unknown, code: 'tool_execution_failed' | 'tool_timeout' = 'tool_execution_failed') {
    super(500, code, message, details);
    this.name = 'ToolExecutionError';
  }
}

// Raised when the CRM backend cannot be reached; callers may reconnect and retry.
export class ConnectivityError extends AppError {
  public constructor(message: string, details?: unknown) {
    super(502, 'backend_unreachable', message, details);
    this.name = 'ConnectivityError';
  }
}

// Raised when the CRM backend answers with a fault of its own.
export class BackendError extends AppError {
  public constructor(message: string, details?: unknown) {
    super(502, 'backend_error', message, details);
    this.name = 'BackendError';
  }
}

// This helper normalizes unknown failures into an AppError without leaking internals.
export function normalizeError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }

  if (error instanceof Error) {
    return new AppError(500, 'internal_error', error.message);
  }

  return new AppError(500, 'internal_error', 'An unexpected error occurred.');
}
