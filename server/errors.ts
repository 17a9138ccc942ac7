export interface AppError extends Error {
  code: string;
  isOperational: boolean;
  details?: Record<string, unknown>;
}

export const ErrorCodes = {
  MALFORMED_ROW: "MALFORMED_ROW",
  FILE_READ_FAILED: "FILE_READ_FAILED",
  STORE_WRITE_FAILED: "STORE_WRITE_FAILED",
  CLASSIFIER_FAILED: "CLASSIFIER_FAILED",
  CLASSIFIER_RATE_LIMITED: "CLASSIFIER_RATE_LIMITED",
  CONFIG_INVALID: "CONFIG_INVALID",
  REVIEW_INVALID: "REVIEW_INVALID",
  VALIDATION_ERROR: "VALIDATION_ERROR",
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

export const UserFriendlyMessages: Record<ErrorCode, string> = {
  [ErrorCodes.MALFORMED_ROW]: "A row could not be read and was skipped.",
  [ErrorCodes.FILE_READ_FAILED]: "We couldn't read this file. Check that it is a CSV export from your bank.",
  [ErrorCodes.STORE_WRITE_FAILED]: "We couldn't save the transactions from this file. Nothing from it was written.",
  [ErrorCodes.CLASSIFIER_FAILED]: "The AI classifier is unavailable. Affected transactions stay uncategorized.",
  [ErrorCodes.CLASSIFIER_RATE_LIMITED]: "The AI classifier is rate limiting requests. Try again in a few minutes.",
  [ErrorCodes.CONFIG_INVALID]: "The configuration is incomplete or invalid.",
  [ErrorCodes.REVIEW_INVALID]: "That duplicate review decision can't be applied.",
  [ErrorCodes.VALIDATION_ERROR]: "Some of the information provided isn't valid. Please check and try again.",
};

export class LedgerError extends Error implements AppError {
  code: ErrorCode;
  isOperational: boolean;
  details?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
    this.isOperational = true;
    this.details = details;
  }
}

export type MalformedRowReason =
  | "missing_date"
  | "missing_amount"
  | "unparsable_date"
  | "unparsable_amount";

/** One CSV record that could not become a canonical transaction. Never fatal to its file. */
export class MalformedRowError extends LedgerError {
  reason: MalformedRowReason;

  constructor(reason: MalformedRowReason, message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.MALFORMED_ROW, { reason, ...details });
    this.name = "MalformedRowError";
    this.reason = reason;
  }
}

/** A file that cannot be opened or parsed at all. Fails that file, never the run. */
export class FileReadError extends LedgerError {
  file: string;

  constructor(file: string, message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.FILE_READ_FAILED, { file, ...details });
    this.name = "FileReadError";
    this.file = file;
  }
}

export class StoreWriteError extends LedgerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.STORE_WRITE_FAILED, details);
    this.name = "StoreWriteError";
  }
}

export class ClassifierError extends LedgerError {
  constructor(message: string, code: ErrorCode = ErrorCodes.CLASSIFIER_FAILED, details?: Record<string, unknown>) {
    super(message, code, details);
    this.name = "ClassifierError";
  }
}

export class ConfigError extends LedgerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_INVALID, details);
    this.name = "ConfigError";
  }
}

export class ReviewError extends LedgerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.REVIEW_INVALID, details);
    this.name = "ReviewError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function handleError(error: unknown): {
  message: string;
  code: string;
  details?: Record<string, unknown>;
} {
  if (error instanceof LedgerError) {
    return {
      message: error.message || UserFriendlyMessages[error.code],
      code: error.code,
      details: error.details,
    };
  }

  if (error instanceof Error) {
    return {
      message: error.message || "Something went wrong.",
      code: "UNKNOWN_ERROR",
    };
  }

  return {
    message: "An unexpected error occurred.",
    code: "UNKNOWN_ERROR",
  };
}

export function logError(error: unknown, context: string): void {
  const timestamp = new Date().toISOString();

  if (error instanceof LedgerError) {
    console.error(`[${timestamp}] [${context}] ${error.code}: ${error.message}`, {
      details: error.details,
    });
  } else if (error instanceof Error) {
    console.error(`[${timestamp}] [${context}] Error: ${error.message}`, {
      stack: error.stack,
    });
  } else {
    console.error(`[${timestamp}] [${context}] Unknown error:`, error);
  }
}
