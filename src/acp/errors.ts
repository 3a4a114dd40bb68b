/**
 * Protocol error constructors. Every error carries `data.errorType` so
 * clients can branch without parsing messages.
 */
import { RequestError } from "@agentclientprotocol/sdk";

export const ErrorCode = {
  InvalidRequest: -32600,
  MethodNotFound: -32601,
  InvalidParams: -32602,
  InternalError: -32603,
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export type ErrorData = { errorType: string } & Record<string, unknown>;

export function protocolError(code: ErrorCode, message: string, data: ErrorData): RequestError {
  return new RequestError(code, message, data);
}

export function invalidParams(message: string, errorType: string, fields: Record<string, unknown> = {}): RequestError {
  return protocolError(ErrorCode.InvalidParams, message, { errorType, ...fields });
}

export function invalidRequest(message: string, errorType: string, fields: Record<string, unknown> = {}): RequestError {
  return protocolError(ErrorCode.InvalidRequest, message, { errorType, ...fields });
}

export function internalError(message: string, errorType = "internal_error", fields: Record<string, unknown> = {}): RequestError {
  return protocolError(ErrorCode.InternalError, message, { errorType, ...fields });
}

export function methodNotFound(method: string): RequestError {
  return protocolError(ErrorCode.MethodNotFound, `Method not found: ${method}`, {
    errorType: "method_not_found",
    method,
  });
}

export function sessionNotFound(sessionId: string): RequestError {
  return invalidParams("Session not found: sessionId does not exist or has expired", "session_not_found", {
    sessionId,
  });
}

export function invalidSessionId(sessionId: string): RequestError {
  return invalidRequest(`Invalid session id: ${sessionId}`, "invalid_session_id", { sessionId });
}

export function contentTooLarge(size: number, maxSize: number): RequestError {
  return invalidParams(
    `Content size ${size} bytes exceeds maximum ${maxSize} bytes (limit is exclusive)`,
    "content_too_large",
    { size, maxSize },
  );
}

export function capabilityNotDeclared(method: string, capability: string): RequestError {
  return invalidParams(`${method} requires the client to declare ${capability}`, "capability_not_declared", {
    method,
    requiredCapability: capability,
  });
}

const CLIENT_FAULT_CODES = new Set(["ENOENT", "EACCES", "EPERM", "ENOTDIR", "EISDIR"]);

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/** Missing files and permission problems are the caller's fault; anything else is ours. */
export function fileIoError(err: unknown, path: string, operation: "read" | "write"): RequestError {
  if (err instanceof RequestError) return err;
  const code = errnoCode(err);
  const detail = err instanceof Error ? err.message : String(err);
  if (code && CLIENT_FAULT_CODES.has(code)) {
    return invalidParams(`Failed to ${operation} ${path}: ${detail}`, "file_io_error", { path, code });
  }
  return internalError(`Failed to ${operation} ${path}: ${detail}`, "file_io_error", { path, code: code ?? null });
}
