/**
 * Error type definitions.
 */

/**
 * Configuration issue structure.
 */
export interface ConfigIssue {
  /** Field path (e.g., "port" or "log.level") */
  field: string;
  /** Error message */
  message: string;
  /** Schema error code */
  code?: string;
}

/**
 * Serialized error structure, used for structured log lines.
 */
export interface ErrorJSON {
  error: {
    message: string;
    code: string;
    status: number;
    details?: unknown;
    stack?: string[];
  };
}
