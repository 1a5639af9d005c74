import { z } from 'zod';
import { arg, defineOperation, Operation } from '../registry.js';
import { DeviceTarget, JsonValue } from '../types.js';

const DEVICE_PROPERTIES: Record<string, string> = {
  model: 'ro.product.model',
  manufacturer: 'ro.product.manufacturer',
  androidVersion: 'ro.build.version.release',
  sdk: 'ro.build.version.sdk',
  abi: 'ro.product.cpu.abi',
};

export function deviceToJson(device: DeviceTarget): JsonValue {
  return {
    id: device.id,
    state: device.state,
    model: device.model,
    product: device.product,
    transportId: device.transportId,
  };
}

// `wm size` prints "Physical size: WxH" and, when overridden, "Override size: WxH"
export function parseWindowSize(output: string): { width: number; height: number } | null {
  const override = output.match(/Override size:\s*(\d+)x(\d+)/);
  const physical = output.match(/Physical size:\s*(\d+)x(\d+)/);
  const match = override ?? physical;
  return match ? { width: Number(match[1]), height: Number(match[2]) } : null;
}

export const listDevices: Operation = defineOperation({
  name: 'list_devices',
  description: 'List all connected Android devices and emulators with their connection state',
  input: z.object({}),
  output: 'json',
  requiresDevice: false,
  handler: async (_args, { session }) => {
    const devices = await session.listDevices();
    return { kind: 'json', data: { devices: devices.map(deviceToJson) } };
  },
});

export const getDeviceInfo: Operation = defineOperation({
  name: 'get_device_info',
  description: 'Report model, Android version, SDK level, CPU ABI and screen size of a device',
  input: z.object({ device_id: arg.deviceId() }),
  output: 'json',
  handler: async (args, { session, device }) => {
    const target = await device(args.device_id);
    const info: { [key: string]: JsonValue } = { deviceId: target.id };

    for (const [key, property] of Object.entries(DEVICE_PROPERTIES)) {
      info[key] = (await session.shell(target, `getprop ${property}`)).trim();
    }

    const size = parseWindowSize(await session.shell(target, 'wm size'));
    info.screenSize = size ? { width: size.width, height: size.height } : null;

    return { kind: 'json', data: info };
  },
});
