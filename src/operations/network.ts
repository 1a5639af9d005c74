import path from 'path';
import { z } from 'zod';
import { arg, defineOperation, Operation } from '../registry.js';

export const DEFAULT_CERT_REMOTE_PATH = '/sdcard/Download/ca_cert.crt';

const TRUST_STEPS = [
  'Open Settings',
  'Go to Security > Encryption & credentials > Install a certificate',
  "Choose 'CA certificate'",
  'Browse to the pushed file and select it',
  'Confirm the installation',
];

// Value adb reports when no global proxy is set
function normalizeProxy(raw: string): string | null {
  const value = raw.trim();
  return value === '' || value === 'null' || value === ':0' ? null : value;
}

export const setupProxy: Operation = defineOperation({
  name: 'setup_proxy',
  description: 'Route device HTTP traffic through a proxy (global http_proxy setting)',
  input: z.object({
    device_id: arg.deviceId(),
    host: arg
      .string('Proxy host reachable from the device (10.0.2.2 is the emulator host loopback)')
      .regex(/^[A-Za-z0-9.\-]+$/, 'must be a hostname or IPv4 address'),
    port: arg.port('Proxy port'),
  }),
  output: 'json',
  handler: async (args, { session, device }) => {
    const target = await device(args.device_id);
    const proxy = `${args.host}:${args.port}`;
    await session.shell(target, `settings put global http_proxy ${proxy}`);
    return {
      kind: 'json',
      data: {
        deviceId: target.id,
        proxy,
        note: 'Running apps may need a restart before they pick up the proxy',
      },
    };
  },
});

export const clearProxy: Operation = defineOperation({
  name: 'clear_proxy',
  description: 'Remove the global HTTP proxy setting',
  input: z.object({ device_id: arg.deviceId() }),
  output: 'json',
  handler: async (args, { session, device }) => {
    const target = await device(args.device_id);
    await session.shell(target, 'settings put global http_proxy :0');
    return { kind: 'json', data: { deviceId: target.id, proxy: null } };
  },
});

export const getProxy: Operation = defineOperation({
  name: 'get_proxy',
  description: 'Read the current global HTTP proxy setting',
  input: z.object({ device_id: arg.deviceId() }),
  output: 'json',
  handler: async (args, { session, device }) => {
    const target = await device(args.device_id);
    const raw = await session.shell(target, 'settings get global http_proxy');
    return { kind: 'json', data: { deviceId: target.id, proxy: normalizeProxy(raw) } };
  },
});

export const installCertificate: Operation = defineOperation({
  name: 'install_certificate',
  description: 'Push a CA certificate to the device so it can be trusted from Settings',
  input: z.object({
    device_id: arg.deviceId(),
    cert_path: arg.string('Path to the certificate (.pem or .crt) on the host'),
    remote_path: arg.string('Destination on the device').default(DEFAULT_CERT_REMOTE_PATH),
  }),
  output: 'json',
  handler: async (args, { session, device, timeoutMs }) => {
    const target = await device(args.device_id);
    const pushed = await session.pushFile(target, path.resolve(args.cert_path), args.remote_path, {
      timeoutMs: timeoutMs(),
    });
    return {
      kind: 'json',
      data: { deviceId: target.id, remotePath: pushed.remotePath, bytes: pushed.bytes, steps: TRUST_STEPS },
    };
  },
});
