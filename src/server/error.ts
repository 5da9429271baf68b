/**
 * Tool Error Classification
 *
 * @module server/error
 * @license BSD-3-Clause
 */

/**
 * Failure category reported to the agent
 *
 * Precondition errors are raised before any language server call,
 * upstream errors come from the language server or its process.
 */
export type ErrorCategory = 'precondition' | 'upstream';

export type PreconditionCode =
  | 'file_not_found'
  | 'invalid_argument'
  | 'invalid_workspace'
  | 'no_session'
  | 'session_active'
  | 'unsupported_capability'
  | 'unsupported_language';

export type UpstreamCode =
  | 'cancelled'
  | 'missing_capabilities'
  | 'server_error'
  | 'server_start_failed'
  | 'timeout';

export type ErrorCode = PreconditionCode | UpstreamCode;

/**
 * Serialized error payload returned inside an MCP tool result
 *
 * @interface ErrorPayload
 */
export interface ErrorPayload {
  error: {
    category: ErrorCategory;
    code: ErrorCode;
    message: string;
  };
}

const upstreamCodes: ReadonlySet<ErrorCode> = new Set<UpstreamCode>([
  'cancelled',
  'missing_capabilities',
  'server_error',
  'server_start_failed',
  'timeout'
]);

/**
 * Error raised by tool handlers, tagged with category and code
 *
 * @class ToolError
 */
export class ToolError extends Error {
  readonly category: ErrorCategory;
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ToolError';
    this.code = code;
    this.category = upstreamCodes.has(code) ? 'upstream' : 'precondition';
  }

  /**
   * Wraps any thrown value, keeping tool errors as they are
   *
   * Unknown failures are attributed to the language server since every
   * precondition is checked with an explicit `ToolError`.
   *
   * @param {unknown} error - Thrown value
   * @param {string} context - Message prefix describing the failed operation
   * @returns {ToolError} The same error, or a `server_error` wrapping it
   */
  static from(error: unknown, context: string): ToolError {
    if (error instanceof ToolError) {
      return error;
    }
    const reason = error instanceof Error ? error.message : String(error);
    return new ToolError('server_error', `${context}: ${reason}`, { cause: error });
  }

  toPayload(): ErrorPayload {
    return {
      error: {
        category: this.category,
        code: this.code,
        message: this.message
      }
    };
  }
}
