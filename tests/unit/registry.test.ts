import { z } from 'zod';
import { buildRegistry, DEVICE_OPERATIONS, LIST_OPERATIONS } from '../../src/operations/index.js';
import { arg, defineOperation, OperationRegistry } from '../../src/registry.js';
import { loadConfig } from '../../src/config.js';
import { createRuntime } from '../../src/server.js';
import { HandlerResult, ValidationError } from '../../src/types.js';
import { FakeAdb } from '../mocks/adb.mock.js';

const echo = defineOperation({
  name: 'echo',
  description: 'Echo the arguments back',
  input: z.object({
    count: arg.integerIn('How many times', 1, 5),
    loud: arg.boolean('Shout').default(false),
    mode: z.enum(['plain', 'fancy']).default('plain').describe('Style'),
    label: z.string().optional().describe('Optional label'),
  }),
  output: 'json',
  requiresDevice: false,
  handler: async args => ({ kind: 'json', data: { count: args.count, loud: args.loud, mode: args.mode } }),
});

const pick = defineOperation({
  name: 'pick',
  description: 'Needs exactly one source',
  input: z.object({ a: z.string().optional(), b: z.string().optional() }),
  output: 'text',
  requireOneOf: ['a', 'b'],
  exclusive: true,
  handler: async args => ({ kind: 'text', text: args.a ?? args.b ?? '' }),
});

function rejection(registry: OperationRegistry, name: string, args: unknown): ValidationError {
  const result = registry.validate(name, args);
  if (result.ok) {
    throw new Error(`expected '${name}' to be rejected`);
  }
  return result.error;
}

describe('OperationRegistry', () => {
  const registry = new OperationRegistry().register(echo).register(pick).seal();

  describe('validate', () => {
    it('should reject an unknown operation', () => {
      const error = rejection(registry, 'teleport', {});

      expect(error.reason).toBe('unknownOperation');
      expect(error.field).toBe('op');
      expect(error.message).toBe("Unknown operation 'teleport'");
    });

    it('should name a missing required parameter', () => {
      const error = rejection(registry, 'echo', {});

      expect(error.reason).toBe('missingParam');
      expect(error.field).toBe('count');
      expect(error.message).toBe("Missing required parameter 'count'");
    });

    it('should report a wrong type', () => {
      const error = rejection(registry, 'echo', { count: 'many' });

      expect(error.reason).toBe('wrongType');
      expect(error.field).toBe('count');
      expect(error.message).toBe("Parameter 'count' must be number, got string");
    });

    it('should report values out of range', () => {
      expect(rejection(registry, 'echo', { count: 6 }).reason).toBe('outOfRange');
      expect(rejection(registry, 'echo', { count: 2, mode: 'loud' })).toMatchObject({
        reason: 'outOfRange',
        field: 'mode',
        message: "Parameter 'mode' must be one of plain, fancy",
      });
    });

    it('should coerce numeric and boolean strings', async () => {
      const result = registry.validate('echo', { count: '3', loud: 'true' });
      if (!result.ok) throw result.error;

      const output: HandlerResult = await result.invoke(createRuntime(loadConfig({}), new FakeAdb()).context);

      expect(output).toEqual({ kind: 'json', data: { count: 3, loud: true, mode: 'plain' } });
    });

    it('should require one of a group of parameters', () => {
      expect(rejection(registry, 'pick', {})).toMatchObject({
        reason: 'missingParam',
        field: 'a',
        message: "At least one of 'a', 'b' is required",
      });
    });

    it('should reject more than one of an exclusive group', () => {
      expect(rejection(registry, 'pick', { a: 'x', b: 'y' })).toMatchObject({
        reason: 'outOfRange',
        field: 'b',
        message: "Only one of 'a', 'b' may be given",
      });
    });

    it('should ignore unknown argument keys', () => {
      expect(registry.validate('pick', { a: 'x', extra: 1 }).ok).toBe(true);
    });
  });

  describe('register', () => {
    it('should reject duplicate names', () => {
      const fresh = new OperationRegistry().register(echo);

      expect(() => fresh.register(echo)).toThrow("Duplicate operation name 'echo'");
    });

    it('should reject registration after sealing', () => {
      const late = defineOperation({
        name: 'late',
        description: 'Registered too late',
        input: z.object({}),
        output: 'text',
        handler: async () => ({ kind: 'text', text: '' }),
      });

      expect(() => registry.register(late)).toThrow("Registry is sealed; cannot register 'late'");
    });
  });

  describe('describeAll', () => {
    it('should describe parameters from their schemas', () => {
      const [echoSpec] = registry.describeAll();

      expect(echoSpec.requiresDevice).toBe(false);
      expect(echoSpec.parameters).toEqual([
        { name: 'count', type: 'integer', description: 'How many times', required: true, minimum: 1, maximum: 5 },
        { name: 'loud', type: 'boolean', description: 'Shout', required: false, default: false },
        {
          name: 'mode',
          type: 'string',
          description: 'Style',
          required: false,
          default: 'plain',
          enum: ['plain', 'fancy'],
        },
        { name: 'label', type: 'string', description: 'Optional label', required: false },
      ]);
    });
  });
});

describe('buildRegistry', () => {
  const registry = buildRegistry();

  it('should list list_operations first, followed by the device catalog', () => {
    const names = registry.describeAll().map(spec => spec.name);

    expect(names[0]).toBe(LIST_OPERATIONS);
    expect(names).toHaveLength(DEVICE_OPERATIONS.length + 1);
    expect(new Set(names).size).toBe(names.length);
  });

  it('should mark device-free operations', () => {
    const free = registry
      .describeAll()
      .filter(spec => !spec.requiresDevice)
      .map(spec => spec.name);

    expect(free).toEqual(['list_operations', 'list_devices']);
  });

  it('should describe tap_coordinates with required coordinates', () => {
    const spec = registry.lookup('tap_coordinates')?.spec;

    expect(spec?.parameters.filter(parameter => parameter.required).map(parameter => parameter.name)).toEqual([
      'x',
      'y',
    ]);
    expect(spec?.parameters.find(parameter => parameter.name === 'x')).toMatchObject({
      type: 'integer',
      minimum: 0,
    });
  });
});
