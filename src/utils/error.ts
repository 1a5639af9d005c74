import { DispatchError, ErrorPayload, InternalError, ValidationError } from '../types.js';

// Anything that is not already a DispatchError becomes an InternalError
export function toDispatchError(error: unknown): DispatchError {
  if (error instanceof DispatchError) {
    return error;
  }

  return new InternalError(error instanceof Error ? error.message : String(error), error);
}

export function toErrorPayload(error: unknown): ErrorPayload {
  const normalized = toDispatchError(error);
  const payload: ErrorPayload = { kind: normalized.kind, message: normalized.message };

  if (normalized.reason) {
    payload.reason = normalized.reason;
  }
  if (normalized instanceof ValidationError && normalized.field) {
    payload.field = normalized.field;
  }
  if (normalized.suggestion) {
    payload.suggestion = normalized.suggestion;
  }

  return payload;
}

// Format error for MCP response
export function formatErrorPayload(payload: ErrorPayload): string {
  const reason = payload.reason ? `[${payload.reason}] ` : '';
  let message = `${payload.kind}: ${reason}${payload.message}`;

  if (payload.suggestion) {
    message += `\n\nSuggestion: ${payload.suggestion}`;
  }

  return message;
}

export function isDeviceError(error: unknown): boolean {
  if (!(error instanceof DispatchError)) {
    return false;
  }

  switch (error.kind) {
    case 'NoDeviceError':
    case 'AmbiguousDeviceError':
    case 'DeviceOfflineError':
      return true;
    default:
      return false;
  }
}
