import path from 'path';
import { z } from 'zod';
import { arg, defineOperation, Operation } from '../registry.js';
import { escapeShellArg } from '../utils/adb.js';
import { ProcessError } from '../types.js';

const INSTALL_TIMEOUT_SECONDS = 120;

const packageName = () =>
  z
    .string()
    .regex(/^[A-Za-z][\w]*(\.[A-Za-z][\w]*)+$/, 'must be a package name such as com.example.app')
    .describe('Application package name (e.g. com.android.settings)');

function expectSuccess(output: string, action: string, command: string): string {
  const trimmed = output.trim();
  if (!/success/i.test(trimmed)) {
    throw new ProcessError('NonZeroExit', `${action} failed: ${trimmed || 'no output'}`, {
      command,
      exitCode: 0,
      stderr: trimmed,
    });
  }
  return trimmed;
}

export function parsePackageList(output: string): string[] {
  return output
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.startsWith('package:'))
    .map(line => line.substring('package:'.length))
    .sort();
}

export const installApp: Operation = defineOperation({
  name: 'install_app',
  description: 'Install an APK from the host onto the device',
  input: z.object({
    device_id: arg.deviceId(),
    apk_path: arg.string('Path to the APK on the host'),
    reinstall: arg.boolean('Replace an existing installation (-r)').default(true),
    grant_permissions: arg.boolean('Grant all runtime permissions at install time (-g)').default(false),
    timeout_seconds: arg.timeoutSeconds(),
  }),
  output: 'json',
  handler: async (args, { session, device, timeoutMs }) => {
    const target = await device(args.device_id);
    const apkPath = path.resolve(args.apk_path);
    const output = await session.installPackage(target, apkPath, {
      reinstall: args.reinstall,
      grantPermissions: args.grant_permissions,
      timeoutMs: timeoutMs(args.timeout_seconds ?? INSTALL_TIMEOUT_SECONDS),
    });
    return { kind: 'json', data: { deviceId: target.id, apkPath, output } };
  },
});

export const uninstallApp: Operation = defineOperation({
  name: 'uninstall_app',
  description: 'Uninstall an application by package name',
  input: z.object({
    device_id: arg.deviceId(),
    package: packageName(),
    keep_data: arg.boolean('Keep the data and cache directories (-k)').default(false),
  }),
  output: 'json',
  handler: async (args, { session, device }) => {
    const target = await device(args.device_id);
    const uninstallArgs = ['uninstall', ...(args.keep_data ? ['-k'] : []), args.package];
    const { stdout } = await session.onDevice(target, uninstallArgs);
    const output = expectSuccess(stdout.toString('utf-8'), 'Uninstall', uninstallArgs.join(' '));
    return { kind: 'json', data: { deviceId: target.id, package: args.package, output } };
  },
});

export const launchApp: Operation = defineOperation({
  name: 'launch_app',
  description: "Launch an application's launcher activity",
  input: z.object({ device_id: arg.deviceId(), package: packageName() }),
  output: 'json',
  handler: async (args, { session, device }) => {
    const target = await device(args.device_id);
    const command = `monkey -p ${escapeShellArg(args.package)} -c android.intent.category.LAUNCHER 1`;
    const output = (await session.shell(target, command)).trim();

    // monkey exits 0 even when the package has no launcher activity
    if (/No activities found to run|monkey aborted/i.test(output)) {
      throw new ProcessError('NonZeroExit', `Failed to launch ${args.package}: ${output}`, {
        command,
        exitCode: 0,
        stderr: output,
      });
    }

    return { kind: 'json', data: { deviceId: target.id, package: args.package, launched: true } };
  },
});

export const stopApp: Operation = defineOperation({
  name: 'stop_app',
  description: 'Force-stop an application',
  input: z.object({ device_id: arg.deviceId(), package: packageName() }),
  output: 'json',
  handler: async (args, { session, device }) => {
    const target = await device(args.device_id);
    await session.shell(target, `am force-stop ${escapeShellArg(args.package)}`);
    return { kind: 'json', data: { deviceId: target.id, package: args.package, stopped: true } };
  },
});

export const clearAppData: Operation = defineOperation({
  name: 'clear_app_data',
  description: "Clear an application's data and cache",
  input: z.object({ device_id: arg.deviceId(), package: packageName() }),
  output: 'json',
  handler: async (args, { session, device }) => {
    const target = await device(args.device_id);
    const command = `pm clear ${escapeShellArg(args.package)}`;
    const output = expectSuccess(await session.shell(target, command), 'Clear app data', command);
    return { kind: 'json', data: { deviceId: target.id, package: args.package, output } };
  },
});

export const listPackages: Operation = defineOperation({
  name: 'list_packages',
  description: 'List installed packages, optionally filtered by a substring',
  input: z.object({
    device_id: arg.deviceId(),
    filter: z.string().optional().describe('Only return package names containing this text'),
    include_system: arg.boolean('Include system packages').default(true),
  }),
  output: 'json',
  handler: async (args, { session, device }) => {
    const target = await device(args.device_id);
    const output = await session.shell(target, args.include_system ? 'pm list packages' : 'pm list packages -3');
    const filter = args.filter;
    const packages = parsePackageList(output).filter(name => !filter || name.includes(filter));
    return { kind: 'json', data: { deviceId: target.id, count: packages.length, packages } };
  },
});

export const getLogcat: Operation = defineOperation({
  name: 'get_logcat',
  description: 'Fetch recent logcat output, optionally filtered by tag and priority',
  input: z.object({
    device_id: arg.deviceId(),
    lines: arg.integerIn('Number of most recent lines to return', 1, 10000).default(200),
    tag: z
      .string()
      .regex(/^[\w.-]+$/, 'must be a plain log tag')
      .optional()
      .describe('Only show this log tag'),
    priority: z.enum(['V', 'D', 'I', 'W', 'E', 'F', 'S']).default('V').describe('Minimum priority for the tag filter'),
    format: z.enum(['time', 'threadtime', 'brief', 'raw']).default('time').describe('logcat output format'),
    timeout_seconds: arg.timeoutSeconds(),
  }),
  output: 'text',
  handler: async (args, { session, device, timeoutMs }) => {
    const target = await device(args.device_id);
    const logcatArgs = ['logcat', '-d', '-v', args.format, '-t', String(args.lines)];
    if (args.tag) {
      logcatArgs.push('-s', `${args.tag}:${args.priority}`);
    }

    const { stdout } = await session.onDevice(target, logcatArgs, {
      timeoutMs: timeoutMs(args.timeout_seconds),
    });
    return { kind: 'text', text: stdout.toString('utf-8').trim() };
  },
});
