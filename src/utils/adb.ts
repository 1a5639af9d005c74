import fs from 'fs';
import path from 'path';
import {
  Artifact,
  AmbiguousDeviceError,
  DeviceOfflineError,
  DeviceState,
  DeviceTarget,
  FileNotFoundError,
  NoDeviceError,
  ProcessError,
  ValidationError,
} from '../types.js';
import { mimeTypeFor, readArtifactFile, withStagingDir } from './artifact.js';
import { log } from './log.js';
import { ExecuteOptions, ProcessExecutor, ProcessResult } from './process.js';

const KNOWN_STATES: readonly DeviceState[] = [
  'device',
  'offline',
  'unauthorized',
  'recovery',
  'sideload',
  'bootloader',
];

const STAGED_NAME = 'artifact';

const OFFLINE_PATTERN = /device offline|device still (?:authorizing|connecting)|error: closed/i;
const DEVICE_GONE_PATTERN = /device '([^']+)' not found|no devices\/emulators found/i;

export interface SessionOptions {
  adbPath: string;
  defaultDevice?: string;
  maxArtifactBytes: number;
}

export interface InstallOptions extends ExecuteOptions {
  reinstall?: boolean;
  grantPermissions?: boolean;
}

export function escapeShellArg(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function encodeInputText(value: string): string {
  return value.replace(/\s/g, '%s');
}

function toState(raw: string): DeviceState {
  return KNOWN_STATES.find(state => state === raw) ?? 'unknown';
}

// Parse `adb devices -l` output
export function parseDeviceList(output: string): DeviceTarget[] {
  const devices: DeviceTarget[] = [];

  for (const rawLine of output.split('\n')) {
    const line = rawLine.trim();
    if (!line || line.startsWith('List of devices') || line.startsWith('*')) continue;

    const parts = line.split(/\s+/);
    if (parts.length < 2) continue;

    const device: DeviceTarget = { id: parts[0], state: toState(parts[1]) };

    for (const part of parts.slice(2)) {
      if (part.startsWith('model:')) {
        device.model = part.substring(6);
      } else if (part.startsWith('product:')) {
        device.product = part.substring(8);
      } else if (part.startsWith('transport_id:')) {
        device.transportId = part.substring(13);
      }
    }

    devices.push(device);
  }

  return devices;
}

function isOffline(error: unknown): error is ProcessError {
  return (
    error instanceof ProcessError &&
    error.failure === 'NonZeroExit' &&
    OFFLINE_PATTERN.test(error.stderr ?? '')
  );
}

/**
 * Typed wrapper around the adb executable. Holds no device state: every
 * operation resolves its own target through {@link DeviceSession.selectDevice}.
 */
export class DeviceSession {
  constructor(
    private readonly executor: ProcessExecutor,
    private readonly options: SessionOptions
  ) {}

  get maxArtifactBytes(): number {
    return this.options.maxArtifactBytes;
  }

  run(args: string[], options: ExecuteOptions = {}): Promise<ProcessResult> {
    return this.executor.execute(this.options.adbPath, args, options);
  }

  async listDevices(): Promise<DeviceTarget[]> {
    const { stdout } = await this.run(['devices', '-l']);
    return parseDeviceList(stdout.toString('utf-8'));
  }

  async selectDevice(explicitId?: string): Promise<DeviceTarget> {
    const devices = await this.listDevices();
    const requested = explicitId ?? this.options.defaultDevice;

    if (requested) {
      const device = devices.find(candidate => candidate.id === requested);
      if (!device) {
        throw new NoDeviceError(`Device '${requested}' is not connected`, {
          deviceId: requested,
          connected: devices.map(candidate => candidate.id),
        });
      }
      if (device.state === 'offline') {
        throw new DeviceOfflineError(device.id);
      }
      if (device.state !== 'device') {
        throw new NoDeviceError(`Device '${device.id}' is not available (state: ${device.state})`, {
          deviceId: device.id,
          state: device.state,
        });
      }
      return device;
    }

    const ready = devices.filter(device => device.state === 'device');
    if (ready.length === 1) {
      return ready[0];
    }
    if (ready.length > 1) {
      throw new AmbiguousDeviceError(ready.map(device => device.id));
    }

    const offline = devices.filter(device => device.state === 'offline');
    if (offline.length === 1) {
      throw new DeviceOfflineError(offline[0].id);
    }
    throw new NoDeviceError(
      devices.length > 0
        ? `No ready Android devices (${devices.map(d => `${d.id}: ${d.state}`).join(', ')})`
        : 'No Android devices found',
      { devices: devices.map(device => ({ id: device.id, state: device.state })) }
    );
  }

  // One silent retry when adb reports the device as transiently offline
  async onDevice(
    target: DeviceTarget,
    args: string[],
    options: ExecuteOptions = {}
  ): Promise<ProcessResult> {
    const fullArgs = ['-s', target.id, ...args];

    for (let attempt = 1; ; attempt++) {
      try {
        return await this.run(fullArgs, options);
      } catch (error) {
        if (isOffline(error)) {
          if (attempt < 2) {
            log.debug('device reported offline, retrying', { deviceId: target.id });
            continue;
          }
          throw new DeviceOfflineError(target.id, error.stderr?.trim());
        }
        if (error instanceof ProcessError && DEVICE_GONE_PATTERN.test(error.stderr ?? '')) {
          throw new NoDeviceError(`Device '${target.id}' disconnected`, { deviceId: target.id });
        }
        throw error;
      }
    }
  }

  async shell(target: DeviceTarget, commandLine: string, options: ExecuteOptions = {}): Promise<string> {
    const { stdout } = await this.onDevice(target, ['shell', commandLine], options);
    return stdout.toString('utf-8');
  }

  async shellWithStderr(
    target: DeviceTarget,
    commandLine: string,
    options: ExecuteOptions = {}
  ): Promise<{ stdout: string; stderr: string }> {
    const result = await this.onDevice(target, ['shell', commandLine], options);
    return { stdout: result.stdout.toString('utf-8'), stderr: result.stderr };
  }

  // The staged host copy is gone before this resolves
  pull(target: DeviceTarget, remotePath: string, options: ExecuteOptions = {}): Promise<Artifact> {
    return withStagingDir(async dir => {
      // fixed name: a remote basename such as '..' must not escape the staging dir
      const localPath = path.join(dir, `${STAGED_NAME}${path.posix.extname(remotePath)}`);
      await this.onDevice(target, ['pull', remotePath, localPath], options);
      if (!fs.statSync(localPath).isFile()) {
        throw new ValidationError('wrongType', `Remote path '${remotePath}' is not a regular file`, 'remote_path');
      }
      const artifact = readArtifactFile(localPath, this.options.maxArtifactBytes, mimeTypeFor(remotePath));
      return { ...artifact, name: path.posix.basename(remotePath) || artifact.name };
    });
  }

  async pushFile(
    target: DeviceTarget,
    localPath: string,
    remotePath: string,
    options: ExecuteOptions = {}
  ): Promise<{ remotePath: string; bytes: number }> {
    if (!fs.existsSync(localPath)) {
      throw new FileNotFoundError(localPath);
    }
    const bytes = fs.statSync(localPath).size;
    await this.onDevice(target, ['push', localPath, remotePath], options);
    return { remotePath, bytes };
  }

  push(
    target: DeviceTarget,
    artifact: Artifact,
    remotePath: string,
    options: ExecuteOptions = {}
  ): Promise<{ remotePath: string; bytes: number }> {
    return withStagingDir(async dir => {
      const localPath = path.join(dir, STAGED_NAME);
      fs.writeFileSync(localPath, artifact.data);
      return this.pushFile(target, localPath, remotePath, options);
    });
  }

  async installPackage(
    target: DeviceTarget,
    apkPath: string,
    options: InstallOptions = {}
  ): Promise<string> {
    if (!fs.existsSync(apkPath)) {
      throw new FileNotFoundError(apkPath);
    }

    const flags = [
      options.reinstall !== false ? '-r' : '',
      options.grantPermissions ? '-g' : '',
    ].filter(Boolean);

    const { stdout } = await this.onDevice(target, ['install', ...flags, apkPath], options);
    const output = stdout.toString('utf-8').trim();

    // older adb releases exit 0 on a failed install
    if (!/success/i.test(output)) {
      throw new ProcessError('NonZeroExit', `APK install failed: ${output || 'no output'}`, {
        command: `adb -s ${target.id} install ${apkPath}`,
        exitCode: 0,
        stderr: output,
      });
    }

    return output;
  }

  async removeRemote(target: DeviceTarget, remotePath: string): Promise<void> {
    try {
      await this.shell(target, `rm -f ${escapeShellArg(remotePath)}`);
    } catch (error) {
      log.warn('failed to remove device-side file', {
        deviceId: target.id,
        remotePath,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
