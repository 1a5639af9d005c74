import fs from 'fs';
import os from 'os';
import path from 'path';
import { loadConfig } from '../../src/config.js';
import { parsePackageList } from '../../src/operations/apps.js';
import { parseWindowSize } from '../../src/operations/device.js';
import { DEFAULT_CERT_REMOTE_PATH } from '../../src/operations/network.js';
import { createRuntime, Runtime } from '../../src/server.js';
import { setLogLevel } from '../../src/utils/log.js';
import { FakeAdb } from '../mocks/adb.mock.js';

describe('Operations', () => {
  let fake: FakeAdb;
  let runtime: Runtime;

  const dispatch = (op: string, args: Record<string, unknown> = {}) => runtime.dispatcher.dispatch({ op, args });
  const shellCommands = () => fake.callsMatching(/ shell /).map(call => call.args[3]);

  beforeAll(() => setLogLevel('error'));

  beforeEach(() => {
    fake = new FakeAdb();
    runtime = createRuntime(loadConfig({}), fake);
  });

  describe('input', () => {
    it('should encode and quote typed text', async () => {
      const response = await dispatch('input_text', { text: "it's a test" });

      expect(response).toEqual({ ok: true, result: { deviceId: 'emulator-5554', text: "it's a test" } });
      expect(shellCommands()).toEqual([`input text 'it'\\''s%sa%stest'`]);
    });

    it('should swipe with the default duration', async () => {
      await dispatch('swipe', { start_x: 10, start_y: 800, end_x: 10, end_y: '200' });

      expect(shellCommands()).toEqual(['input swipe 10 800 10 200 300']);
    });

    it('should reject negative coordinates', async () => {
      const response = await dispatch('tap_coordinates', { x: -1, y: 5 });

      expect(response).toMatchObject({ ok: false, error: { reason: 'outOfRange', field: 'x' } });
    });

    it('should reject an unknown key name', async () => {
      const response = await dispatch('press_key', { key: 'escape' });

      expect(response).toMatchObject({ ok: false, error: { reason: 'outOfRange', field: 'key' } });
    });
  });

  describe('apps', () => {
    it('should uninstall keeping data when asked', async () => {
      const response = await dispatch('uninstall_app', { package: 'com.example.app', keep_data: true });

      expect(response).toEqual({
        ok: true,
        result: { deviceId: 'emulator-5554', package: 'com.example.app', output: 'Success' },
      });
      expect(fake.calls[1].args).toEqual(['-s', 'emulator-5554', 'uninstall', '-k', 'com.example.app']);
    });

    it('should reject an invalid package name', async () => {
      const response = await dispatch('launch_app', { package: 'not a package' });

      expect(response).toMatchObject({ ok: false, error: { kind: 'ValidationError', field: 'package' } });
      expect(fake.calls).toHaveLength(0);
    });

    it('should report a package without a launcher activity', async () => {
      fake.on(/monkey/, '** No activities found to run, monkey aborted.\n');

      const response = await dispatch('launch_app', { package: 'com.example.app' });

      expect(response).toMatchObject({
        ok: false,
        error: {
          kind: 'ProcessError',
          reason: 'NonZeroExit',
          message: 'Failed to launch com.example.app: ** No activities found to run, monkey aborted.',
        },
      });
    });

    it('should launch through the launcher category', async () => {
      fake.on(/monkey/, 'Events injected: 1\n');

      await dispatch('launch_app', { package: 'com.example.app' });

      expect(shellCommands()).toEqual(["monkey -p 'com.example.app' -c android.intent.category.LAUNCHER 1"]);
    });

    it('should fail clear_app_data without Success', async () => {
      fake.on(/pm clear/, 'Failed\n');

      const response = await dispatch('clear_app_data', { package: 'com.example.app' });

      expect(response).toMatchObject({ ok: false, error: { message: 'Clear app data failed: Failed' } });
    });

    it('should filter packages on the host', async () => {
      fake.on(/pm list packages -3$/, 'package:com.example.zeta\npackage:org.sample.notes\npackage:com.example.alpha\n');

      const response = await dispatch('list_packages', { filter: 'example', include_system: 'false' });

      expect(response).toEqual({
        ok: true,
        result: {
          deviceId: 'emulator-5554',
          count: 2,
          packages: ['com.example.alpha', 'com.example.zeta'],
        },
      });
    });

    it('should build logcat arguments with a tag filter', async () => {
      fake.on(/logcat/, '10-18 12:00:00.000 I/ActivityManager( 1): Start proc\n');

      const response = await dispatch('get_logcat', { lines: '50', tag: 'ActivityManager', priority: 'I' });

      expect(response).toEqual({
        ok: true,
        result: '10-18 12:00:00.000 I/ActivityManager( 1): Start proc',
      });
      expect(fake.calls[1].args).toEqual([
        '-s',
        'emulator-5554',
        'logcat',
        '-d',
        '-v',
        'time',
        '-t',
        '50',
        '-s',
        'ActivityManager:I',
      ]);
    });

    it('should install with the long install timeout', async () => {
      const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'install-test-'));
      const apk = path.join(dir, 'app-debug.apk');
      fs.writeFileSync(apk, 'placeholder');

      try {
        const response = await dispatch('install_app', { apk_path: apk });

        expect(response).toEqual({ ok: true, result: { deviceId: 'emulator-5554', apkPath: apk, output: 'Success' } });
        expect(fake.calls[1]).toMatchObject({
          args: ['-s', 'emulator-5554', 'install', '-r', apk],
          options: { timeoutMs: 120_000 },
        });
      } finally {
        fs.rmSync(dir, { recursive: true, force: true });
      }
    });

    it('should report a missing APK', async () => {
      const response = await dispatch('install_app', { apk_path: '/nonexistent/app.apk' });

      expect(response).toMatchObject({
        ok: false,
        error: { kind: 'FileNotFoundError', message: 'Local file not found: /nonexistent/app.apk' },
      });
    });
  });

  describe('network', () => {
    it('should set the global proxy', async () => {
      const response = await dispatch('setup_proxy', { host: '10.0.2.2', port: '8080' });

      expect(response).toMatchObject({ ok: true, result: { proxy: '10.0.2.2:8080' } });
      expect(shellCommands()).toEqual(['settings put global http_proxy 10.0.2.2:8080']);
    });

    it('should reject an out of range port', async () => {
      const response = await dispatch('setup_proxy', { host: '10.0.2.2', port: 70000 });

      expect(response).toMatchObject({ ok: false, error: { reason: 'outOfRange', field: 'port' } });
    });

    it('should report a cleared proxy as null', async () => {
      fake.on(/settings get global http_proxy/, ':0\n');

      const response = await dispatch('get_proxy');

      expect(response).toEqual({ ok: true, result: { deviceId: 'emulator-5554', proxy: null } });
    });

    it('should push a certificate to the default location', async () => {
      const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cert-test-'));
      const cert = path.join(dir, 'proxy-ca.pem');
      fs.writeFileSync(cert, '-----BEGIN CERTIFICATE-----\nplaceholder\n-----END CERTIFICATE-----\n');

      try {
        const response = await dispatch('install_certificate', { cert_path: cert });

        expect(response).toMatchObject({
          ok: true,
          result: { remotePath: DEFAULT_CERT_REMOTE_PATH, bytes: fs.statSync(cert).size },
        });
        expect(fake.files.get(DEFAULT_CERT_REMOTE_PATH)?.equals(fs.readFileSync(cert))).toBe(true);
      } finally {
        fs.rmSync(dir, { recursive: true, force: true });
      }
    });
  });
});

describe('parsePackageList', () => {
  it('should strip prefixes, skip noise and sort', () => {
    expect(parsePackageList('package:b.app\r\nWARNING: linker\npackage:a.app\n')).toEqual(['a.app', 'b.app']);
  });
});

describe('parseWindowSize', () => {
  it('should use the physical size when there is no override', () => {
    expect(parseWindowSize('Physical size: 1080x2400\n')).toEqual({ width: 1080, height: 2400 });
  });

  it('should return null for unexpected output', () => {
    expect(parseWindowSize('error')).toBeNull();
  });
});
