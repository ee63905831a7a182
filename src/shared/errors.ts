export type ErrorCode =
  | 'INVALID_PARAMS'
  | 'NOT_FOUND'
  | 'MAPPING_ERROR'
  | 'UPSTREAM_ERROR'
  | 'INTERNAL_ERROR';

const RETRYABLE_BY_CODE: Record<ErrorCode, boolean> = {
  UPSTREAM_ERROR: true,
  INVALID_PARAMS: false,
  NOT_FOUND: false,
  MAPPING_ERROR: false,
  INTERNAL_ERROR: false,
};

export class McpError extends Error {
  readonly retryable: boolean;

  constructor(
    public code: ErrorCode,
    message: string,
    public data?: unknown
  ) {
    super(message);
    this.name = 'McpError';
    this.retryable = RETRYABLE_BY_CODE[code];
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      data: this.data,
    };
  }
}

export function invalidParams(message: string, data?: unknown): McpError {
  return new McpError('INVALID_PARAMS', message, data);
}

export function notFound(message: string, data?: unknown): McpError {
  return new McpError('NOT_FOUND', message, data);
}

export function upstreamError(message: string, data?: unknown): McpError {
  return new McpError('UPSTREAM_ERROR', message, data);
}

/** A configuration value the method mapper has no vocabulary entry for. */
export function mappingError(field: string, value: unknown, message?: string): McpError {
  return new McpError(
    'MAPPING_ERROR',
    message ?? `Cannot map ${field}=${JSON.stringify(value)}`,
    { field, value },
  );
}

export function isMappingError(err: unknown): err is McpError {
  return err instanceof McpError && err.code === 'MAPPING_ERROR';
}
