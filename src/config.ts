import fs from 'fs';
import path from 'path';
import { parseArgs } from 'util';
import { z } from 'zod';
import { MAX_TIMEOUT_SECONDS } from './utils/process.js';

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const positiveInt = (fallback: number, max = Number.MAX_SAFE_INTEGER) =>
  z.preprocess(
    value => (value === undefined || value === '' ? undefined : Number(value)),
    z.number().int().positive().max(max).default(fallback)
  );

const ConfigSchema = z.object({
  adbPath: z.string().min(1).default('adb'),
  defaultDevice: z.string().min(1).optional(),
  timeoutSeconds: positiveInt(30, MAX_TIMEOUT_SECONDS),
  maxArtifactBytes: positiveInt(10 * 1024 * 1024),
  maxProcesses: positiveInt(4),
  protocol: z.enum(['mcp', 'line']).default('mcp'),
  listenPort: z.preprocess(
    value => (value === undefined || value === '' ? undefined : Number(value)),
    z.number().int().min(1).max(65535).optional()
  ),
  logLevel: z.enum(LOG_LEVELS).default('info'),
});

export type Config = z.infer<typeof ConfigSchema>;

export interface CliOptions {
  showVersion: boolean;
  overrides: Record<string, string | undefined>;
}

const ENV_KEYS: Record<keyof Config, string[]> = {
  adbPath: ['ADB_PATH'],
  defaultDevice: ['ANDROID_DISPATCH_DEVICE', 'ANDROID_SERIAL'],
  timeoutSeconds: ['ANDROID_DISPATCH_TIMEOUT_SECONDS'],
  maxArtifactBytes: ['ANDROID_DISPATCH_MAX_ARTIFACT_BYTES'],
  maxProcesses: ['ANDROID_DISPATCH_MAX_PROCESSES'],
  protocol: ['ANDROID_DISPATCH_PROTOCOL'],
  listenPort: ['ANDROID_DISPATCH_LISTEN'],
  logLevel: ['ANDROID_DISPATCH_LOG_LEVEL'],
};

export class ConfigError extends Error {
  constructor(public issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

export function parseCliArgs(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    strict: true,
    options: {
      version: { type: 'boolean', short: 'v' },
      adb: { type: 'string' },
      device: { type: 'string' },
      timeout: { type: 'string' },
      'max-artifact-bytes': { type: 'string' },
      'max-processes': { type: 'string' },
      protocol: { type: 'string' },
      listen: { type: 'string' },
      'log-level': { type: 'string' },
    },
  });

  return {
    showVersion: values.version === true,
    overrides: {
      adbPath: values.adb,
      defaultDevice: values.device,
      timeoutSeconds: values.timeout,
      maxArtifactBytes: values['max-artifact-bytes'],
      maxProcesses: values['max-processes'],
      protocol: values.protocol,
      listenPort: values.listen,
      logLevel: values['log-level'],
    },
  };
}

function fromEnv(env: NodeJS.ProcessEnv): Record<string, string | undefined> {
  const raw: Record<string, string | undefined> = {};
  for (const [key, names] of Object.entries(ENV_KEYS)) {
    const name = names.find(candidate => env[candidate]?.trim());
    raw[key] = name ? env[name]?.trim() : undefined;
  }
  return raw;
}

const SDK_ROOT_KEYS = ['ANDROID_HOME', 'ANDROID_SDK_ROOT'];

// adb from the SDK's platform-tools, when no explicit path is given
export function findSdkAdb(
  env: NodeJS.ProcessEnv,
  exists: (candidate: string) => boolean = fs.existsSync
): string | undefined {
  const executable = process.platform === 'win32' ? 'adb.exe' : 'adb';
  for (const key of SDK_ROOT_KEYS) {
    const root = env[key]?.trim();
    if (!root) continue;
    const candidate = path.join(root, 'platform-tools', executable);
    if (exists(candidate)) {
      return candidate;
    }
  }
  return undefined;
}

// Flags win over environment variables
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Record<string, string | undefined> = {}
): Config {
  const raw = fromEnv(env);
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      raw[key] = value;
    }
  }

  raw.adbPath ??= findSdkAdb(env);

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => {
        const key = String(issue.path[0] ?? '');
        const names = Object.entries(ENV_KEYS).find(([name]) => name === key)?.[1];
        return `${names?.[0] ?? key}: ${issue.message}`;
      })
    );
  }

  return parsed.data;
}
