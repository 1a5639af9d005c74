// Device information interfaces
export type DeviceState =
  | 'device'
  | 'offline'
  | 'unauthorized'
  | 'recovery'
  | 'sideload'
  | 'bootloader'
  | 'unknown';

export interface DeviceTarget {
  id: string;
  state: DeviceState;
  model?: string;
  product?: string;
  transportId?: string;
}

// Transient payload produced by an operation
export interface Artifact {
  data: Buffer;
  mimeType: string;
  name?: string;
}

export type OutputKind = 'text' | 'json' | 'binary';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue | undefined };

export type HandlerResult =
  | { kind: 'text'; text: string }
  | { kind: 'json'; data: JsonValue }
  | { kind: 'binary'; artifact: Artifact; meta?: { [key: string]: JsonValue } };

// Wire envelope
export interface Request {
  op: string;
  args: Record<string, unknown>;
}

export interface ErrorPayload {
  kind: ErrorKind;
  message: string;
  reason?: string;
  field?: string;
  suggestion?: string;
}

export type Response = { ok: true; result: JsonValue } | { ok: false; error: ErrorPayload };

// Error handling
export type ErrorKind =
  | 'ValidationError'
  | 'NoDeviceError'
  | 'AmbiguousDeviceError'
  | 'DeviceOfflineError'
  | 'ProcessError'
  | 'ArtifactTooLargeError'
  | 'FileNotFoundError'
  | 'InternalError';

export type ValidationReason =
  | 'malformedRequest'
  | 'unknownOperation'
  | 'missingParam'
  | 'wrongType'
  | 'outOfRange';

export type ProcessFailure = 'TimedOut' | 'NotFound' | 'NonZeroExit';

export class DispatchError extends Error {
  kind: ErrorKind;
  reason?: string;
  details?: Record<string, unknown>;
  suggestion?: string;

  constructor(
    kind: ErrorKind,
    message: string,
    options: { reason?: string; details?: Record<string, unknown>; suggestion?: string } = {}
  ) {
    super(message);
    this.name = kind;
    this.kind = kind;
    this.reason = options.reason;
    this.details = options.details;
    this.suggestion = options.suggestion;
  }
}

export class ValidationError extends DispatchError {
  field?: string;

  constructor(reason: ValidationReason, message: string, field?: string) {
    super('ValidationError', message, { reason, details: field ? { field } : undefined });
    this.field = field;
  }
}

export class NoDeviceError extends DispatchError {
  constructor(message = 'No Android devices found', details?: Record<string, unknown>) {
    super('NoDeviceError', message, {
      details,
      suggestion:
        'Start an emulator or connect a device with USB debugging enabled, then check `adb devices`',
    });
  }
}

export class AmbiguousDeviceError extends DispatchError {
  constructor(deviceIds: string[]) {
    super(
      'AmbiguousDeviceError',
      `Multiple devices connected (${deviceIds.join(', ')}); pass device_id to choose one`,
      {
        details: { deviceIds },
        suggestion: 'Set device_id on the request or configure a default device',
      }
    );
  }
}

export class DeviceOfflineError extends DispatchError {
  constructor(deviceId: string, output?: string) {
    super('DeviceOfflineError', `Device '${deviceId}' is offline`, {
      details: { deviceId, output },
      suggestion: 'Wait for the emulator to finish booting or reconnect the device',
    });
  }
}

export class ProcessError extends DispatchError {
  failure: ProcessFailure;
  exitCode?: number;
  stdout?: string;
  stderr?: string;

  constructor(
    failure: ProcessFailure,
    message: string,
    details: { command: string; exitCode?: number; stdout?: string; stderr?: string; timeoutMs?: number }
  ) {
    super('ProcessError', message, {
      reason: failure,
      details,
      suggestion:
        failure === 'NotFound'
          ? 'Install Android SDK Platform Tools and make sure adb is on PATH (or set ADB_PATH)'
          : undefined,
    });
    this.failure = failure;
    this.exitCode = details.exitCode;
    this.stdout = details.stdout;
    this.stderr = details.stderr;
  }
}

export class ArtifactTooLargeError extends DispatchError {
  constructor(size: number, limit: number) {
    super('ArtifactTooLargeError', `Artifact is ${size} bytes, exceeding the ${limit} byte limit`, {
      details: { size, limit },
      suggestion: 'Raise ANDROID_DISPATCH_MAX_ARTIFACT_BYTES or fetch a smaller file',
    });
  }
}

export class FileNotFoundError extends DispatchError {
  constructor(filePath: string) {
    super('FileNotFoundError', `Local file not found: ${filePath}`, { details: { path: filePath } });
  }
}

export class InternalError extends DispatchError {
  constructor(message: string, cause?: unknown) {
    super('InternalError', message, {
      details: cause instanceof Error ? { cause: cause.message } : undefined,
    });
  }
}
