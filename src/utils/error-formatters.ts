import { ZodError } from "zod";

const safeStringify = (value: unknown): string => {
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
};

const formatError = (error: unknown): { message: string; stack?: string } => {
  if (error instanceof ZodError) {
    const message = error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    return { message: message || "Unknown validation error" };
  }
  if (error instanceof Error) {
    return {
      message: error.message,
      ...(error.stack === undefined ? {} : { stack: error.stack }),
    };
  }
  if (typeof error === "string") {
    return { message: error };
  }
  if (error === null || error === undefined) {
    return { message: String(error) };
  }
  return { message: safeStringify(error) };
};

/**
 * Formats an error for logging.
 *
 * @param includeStack - Whether to append the stack trace when there is one
 */
export const formatLogError = (error: unknown, includeStack = true): string => {
  const { message, stack } = formatError(error);
  return includeStack && stack !== undefined ? `${message}: ${stack}` : message;
};
