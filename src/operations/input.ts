import { z } from 'zod';
import { arg, defineOperation, Operation } from '../registry.js';
import { encodeInputText, escapeShellArg } from '../utils/adb.js';

export const KEY_CODES = {
  back: 4,
  home: 3,
  recent: 187,
  menu: 82,
  power: 26,
  volume_up: 24,
  volume_down: 25,
} as const;

export const tapCoordinates: Operation = defineOperation({
  name: 'tap_coordinates',
  description: 'Send a tap event at screen coordinates',
  input: z.object({
    device_id: arg.deviceId(),
    x: arg.nonNegative('X coordinate in pixels'),
    y: arg.nonNegative('Y coordinate in pixels'),
  }),
  output: 'json',
  handler: async (args, { session, device }) => {
    const target = await device(args.device_id);
    await session.shell(target, `input tap ${args.x} ${args.y}`);
    return { kind: 'json', data: { deviceId: target.id, x: args.x, y: args.y } };
  },
});

export const swipe: Operation = defineOperation({
  name: 'swipe',
  description: 'Send a swipe gesture between two points',
  input: z.object({
    device_id: arg.deviceId(),
    start_x: arg.nonNegative('Start X coordinate'),
    start_y: arg.nonNegative('Start Y coordinate'),
    end_x: arg.nonNegative('End X coordinate'),
    end_y: arg.nonNegative('End Y coordinate'),
    duration: arg.nonNegative('Gesture duration in milliseconds').default(300),
  }),
  output: 'json',
  handler: async (args, { session, device }) => {
    const target = await device(args.device_id);
    await session.shell(
      target,
      `input swipe ${args.start_x} ${args.start_y} ${args.end_x} ${args.end_y} ${args.duration}`
    );
    return {
      kind: 'json',
      data: {
        deviceId: target.id,
        start: { x: args.start_x, y: args.start_y },
        end: { x: args.end_x, y: args.end_y },
        durationMs: args.duration,
      },
    };
  },
});

export const inputText: Operation = defineOperation({
  name: 'input_text',
  description: 'Type text into the focused input field',
  input: z.object({
    device_id: arg.deviceId(),
    text: arg.string('Text to type').min(1),
  }),
  output: 'json',
  handler: async (args, { session, device }) => {
    const target = await device(args.device_id);
    await session.shell(target, `input text ${escapeShellArg(encodeInputText(args.text))}`);
    return { kind: 'json', data: { deviceId: target.id, text: args.text } };
  },
});

export const pressKey: Operation = defineOperation({
  name: 'press_key',
  description: 'Press a hardware or navigation key',
  input: z.object({
    device_id: arg.deviceId(),
    key: z.enum(['back', 'home', 'recent', 'menu', 'power', 'volume_up', 'volume_down']).describe('Key to press'),
  }),
  output: 'json',
  handler: async (args, { session, device }) => {
    const target = await device(args.device_id);
    const keyCode = KEY_CODES[args.key];
    await session.shell(target, `input keyevent ${keyCode}`);
    return { kind: 'json', data: { deviceId: target.id, key: args.key, keyCode } };
  },
});
