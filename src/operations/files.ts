import path from 'path';
import { z } from 'zod';
import { arg, defineOperation, Operation } from '../registry.js';
import { checkArtifactSize, mimeTypeFor } from '../utils/artifact.js';
import { ProcessError, ValidationError } from '../types.js';

const SHELL_TIMEOUT_SECONDS = 60;

const remotePath = (description: string) =>
  arg.string(description).min(1).regex(/^\//, 'must be an absolute device path');

export const executeShell: Operation = defineOperation({
  name: 'execute_shell',
  description: 'Run a shell command on the device and return its output',
  input: z.object({
    device_id: arg.deviceId(),
    command: arg.string('Shell command line').min(1),
    timeout_seconds: arg.timeoutSeconds(),
  }),
  output: 'json',
  handler: async (args, { session, device, timeoutMs }) => {
    const target = await device(args.device_id);
    const result = { deviceId: target.id, command: args.command };
    try {
      const { stdout, stderr } = await session.shellWithStderr(target, args.command, {
        timeoutMs: timeoutMs(args.timeout_seconds ?? SHELL_TIMEOUT_SECONDS),
      });
      return { kind: 'json', data: { ...result, exitCode: 0, stdout, stderr } };
    } catch (error) {
      // the command ran and failed; offline, missing adb and timeouts stay errors
      if (error instanceof ProcessError && error.failure === 'NonZeroExit' && error.exitCode !== undefined) {
        return {
          kind: 'json',
          data: { ...result, exitCode: error.exitCode, stdout: error.stdout ?? '', stderr: error.stderr ?? '' },
        };
      }
      throw error;
    }
  },
});

export const pullFile: Operation = defineOperation({
  name: 'pull_file',
  description: 'Read a file from the device',
  input: z.object({
    device_id: arg.deviceId(),
    remote_path: remotePath('Absolute path on the device'),
    timeout_seconds: arg.timeoutSeconds(),
  }),
  output: 'binary',
  handler: async (args, { session, device, timeoutMs }) => {
    const target = await device(args.device_id);
    const artifact = await session.pull(target, args.remote_path, {
      timeoutMs: timeoutMs(args.timeout_seconds),
    });
    return {
      kind: 'binary',
      artifact,
      meta: { deviceId: target.id, remotePath: args.remote_path },
    };
  },
});

export const pushFile: Operation = defineOperation({
  name: 'push_file',
  description: 'Write a host file, or inline base64 data, to a path on the device',
  input: z.object({
    device_id: arg.deviceId(),
    remote_path: remotePath('Absolute destination path on the device'),
    local_path: z.string().min(1).optional().describe('Path of the file on the host'),
    data: z
      .string()
      .regex(/^[A-Za-z0-9+/]*={0,2}$/, 'must be base64')
      .optional()
      .describe('File content as base64, instead of local_path'),
    timeout_seconds: arg.timeoutSeconds(),
  }),
  output: 'json',
  requireOneOf: ['local_path', 'data'],
  exclusive: true,
  handler: async (args, { session, device, timeoutMs }) => {
    const target = await device(args.device_id);
    const options = { timeoutMs: timeoutMs(args.timeout_seconds) };

    let pushed: { remotePath: string; bytes: number };
    if (args.data !== undefined) {
      const data = Buffer.from(args.data, 'base64');
      checkArtifactSize(data.length, session.maxArtifactBytes);
      pushed = await session.push(
        target,
        { data, mimeType: mimeTypeFor(args.remote_path), name: path.posix.basename(args.remote_path) },
        args.remote_path,
        options
      );
    } else if (args.local_path !== undefined) {
      pushed = await session.pushFile(target, path.resolve(args.local_path), args.remote_path, options);
    } else {
      throw new ValidationError('missingParam', "One of 'local_path' or 'data' is required", 'local_path');
    }

    return { kind: 'json', data: { deviceId: target.id, ...pushed } };
  },
});
