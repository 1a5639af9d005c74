import { z } from 'zod';
import type { Config } from './config.js';
import type { DeviceSession } from './utils/adb.js';
import { MAX_TIMEOUT_SECONDS } from './utils/process.js';
import { DeviceTarget, HandlerResult, JsonValue, OutputKind, ValidationError } from './types.js';

export type ParameterType = 'string' | 'integer' | 'number' | 'boolean';

export interface ParameterSpec {
  name: string;
  type: ParameterType;
  description?: string;
  required: boolean;
  default?: JsonValue;
  enum?: string[];
  minimum?: number;
  maximum?: number;
}

export interface OperationSpec {
  name: string;
  description: string;
  parameters: ParameterSpec[];
  output: OutputKind;
  requiresDevice: boolean;
  // at least one of these must be supplied
  requireOneOf?: string[];
  exclusive?: boolean;
}

export interface OperationContext {
  session: DeviceSession;
  config: Config;
  /** Resolves the target device for this request only. */
  device(explicitId?: string): Promise<DeviceTarget>;
  /** Timeout for one external process, falling back to the configured default. */
  timeoutMs(seconds?: number): number;
}

export type Invocation = (context: OperationContext) => Promise<HandlerResult>;

export interface OperationDefinition<S extends z.AnyZodObject> {
  name: string;
  description: string;
  input: S;
  output: OutputKind;
  requiresDevice?: boolean;
  requireOneOf?: (keyof z.infer<S> & string)[];
  // when set, exactly one of requireOneOf may be supplied
  exclusive?: boolean;
  handler: (args: z.infer<S>, context: OperationContext) => Promise<HandlerResult>;
}

export interface Operation {
  spec: OperationSpec;
  bind(args: unknown): ValidationResult;
}

export type ValidationResult =
  | { ok: true; invoke: Invocation }
  | { ok: false; error: ValidationError };

// Accepts numeric strings for number parameters
function coerceNumber(value: unknown): unknown {
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) {
    return Number(value);
  }
  return value;
}

function coerceBoolean(value: unknown): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  return value;
}

export const arg = {
  string: (description: string) => z.string().describe(description),
  nonNegative: (description: string) =>
    z.preprocess(coerceNumber, z.number().int().min(0)).describe(description),
  integerIn: (description: string, min: number, max: number) =>
    z.preprocess(coerceNumber, z.number().int().min(min).max(max)).describe(description),
  port: (description: string) =>
    z.preprocess(coerceNumber, z.number().int().min(1).max(65535)).describe(description),
  boolean: (description: string) => z.preprocess(coerceBoolean, z.boolean()).describe(description),
  deviceId: () =>
    z
      .string()
      .min(1)
      .optional()
      .describe('Target device serial (e.g. emulator-5554). Required when several devices are connected.'),
  timeoutSeconds: () =>
    z
      .preprocess(coerceNumber, z.number().int().positive().max(MAX_TIMEOUT_SECONDS))
      .optional()
      .describe('Timeout in seconds for the underlying adb command'),
};

function toJsonDefault(value: unknown): JsonValue | undefined {
  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value === null
  ) {
    return value;
  }
  return undefined;
}

function describeParameter(name: string, schema: z.ZodTypeAny): ParameterSpec {
  const spec: ParameterSpec = { name, type: 'string', required: true, description: schema.description };
  let current: z.ZodTypeAny = schema;

  for (;;) {
    spec.description ??= current.description;
    if (current instanceof z.ZodOptional) {
      spec.required = false;
      current = current.unwrap();
    } else if (current instanceof z.ZodDefault) {
      spec.required = false;
      spec.default = toJsonDefault(current._def.defaultValue());
      current = current.removeDefault();
    } else if (current instanceof z.ZodEffects) {
      current = current.innerType();
    } else {
      break;
    }
  }

  if (current instanceof z.ZodNumber) {
    spec.type = current.isInt ? 'integer' : 'number';
    spec.minimum = current.minValue ?? undefined;
    spec.maximum = current.maxValue ?? undefined;
  } else if (current instanceof z.ZodBoolean) {
    spec.type = 'boolean';
  } else if (current instanceof z.ZodEnum) {
    spec.enum = [...current.options];
  }

  return spec;
}

function toValidationError(issue: z.ZodIssue): ValidationError {
  const field = issue.path.map(String).join('.') || undefined;
  const label = field ? `'${field}'` : 'arguments';

  switch (issue.code) {
    case z.ZodIssueCode.invalid_type:
      if (issue.received === 'undefined') {
        return new ValidationError('missingParam', `Missing required parameter ${label}`, field);
      }
      return new ValidationError(
        'wrongType',
        `Parameter ${label} must be ${issue.expected}, got ${issue.received}`,
        field
      );
    case z.ZodIssueCode.invalid_enum_value:
      return new ValidationError(
        'outOfRange',
        `Parameter ${label} must be one of ${issue.options.join(', ')}`,
        field
      );
    case z.ZodIssueCode.too_small:
    case z.ZodIssueCode.too_big:
      return new ValidationError('outOfRange', `Parameter ${label}: ${issue.message}`, field);
    default:
      return new ValidationError('wrongType', `Parameter ${label}: ${issue.message}`, field);
  }
}

export function defineOperation<S extends z.AnyZodObject>(definition: OperationDefinition<S>): Operation {
  const spec: OperationSpec = {
    name: definition.name,
    description: definition.description,
    parameters: Object.entries<z.ZodTypeAny>(definition.input.shape).map(([name, schema]) =>
      describeParameter(name, schema)
    ),
    output: definition.output,
    requiresDevice: definition.requiresDevice ?? true,
    requireOneOf: definition.requireOneOf ? [...definition.requireOneOf] : undefined,
    exclusive: definition.exclusive,
  };

  return {
    spec,
    bind(args: unknown): ValidationResult {
      const parsed = definition.input.safeParse(args ?? {});
      if (!parsed.success) {
        return { ok: false, error: toValidationError(parsed.error.issues[0]) };
      }

      const data: z.infer<S> = parsed.data;
      const oneOf = definition.requireOneOf;
      if (oneOf) {
        const supplied = oneOf.filter(key => data[key] !== undefined);
        const names = oneOf.map(key => `'${key}'`).join(', ');
        if (supplied.length === 0) {
          return {
            ok: false,
            error: new ValidationError('missingParam', `At least one of ${names} is required`, oneOf[0]),
          };
        }
        if (definition.exclusive && supplied.length > 1) {
          return {
            ok: false,
            error: new ValidationError('outOfRange', `Only one of ${names} may be given`, supplied[1]),
          };
        }
      }

      return { ok: true, invoke: context => definition.handler(data, context) };
    },
  };
}

/**
 * Immutable catalog of operations. Filled once at startup; safe to share
 * across connections because nothing mutates it afterwards.
 */
export class OperationRegistry {
  private readonly operations = new Map<string, Operation>();
  private sealed = false;

  register(operation: Operation): this {
    if (this.sealed) {
      throw new Error(`Registry is sealed; cannot register '${operation.spec.name}'`);
    }
    if (this.operations.has(operation.spec.name)) {
      throw new Error(`Duplicate operation name '${operation.spec.name}'`);
    }
    this.operations.set(operation.spec.name, operation);
    return this;
  }

  seal(): this {
    this.sealed = true;
    return this;
  }

  lookup(name: string): Operation | undefined {
    return this.operations.get(name);
  }

  describeAll(): OperationSpec[] {
    return [...this.operations.values()].map(operation => operation.spec);
  }

  validate(name: string, args: unknown): ValidationResult & { spec?: OperationSpec } {
    const operation = this.lookup(name);
    if (!operation) {
      return {
        ok: false,
        error: new ValidationError('unknownOperation', `Unknown operation '${name}'`, 'op'),
      };
    }
    return { ...operation.bind(args), spec: operation.spec };
  }
}
