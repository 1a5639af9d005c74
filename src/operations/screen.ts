import { randomUUID } from 'crypto';
import { z } from 'zod';
import { arg, defineOperation, Operation, OperationContext } from '../registry.js';
import { escapeShellArg } from '../utils/adb.js';
import { getPNGDimensions } from '../utils/artifact.js';
import { log } from '../utils/log.js';
import { centerOfBounds, extractUiNodes, findNodes, UiNode } from '../utils/ui.js';
import { Artifact, DeviceTarget, JsonValue } from '../types.js';

const DEVICE_STAGING_DIR = '/sdcard';

function deviceStagingPath(extension: string): string {
  return `${DEVICE_STAGING_DIR}/dispatch-${randomUUID()}.${extension}`;
}

/**
 * Runs `produce` to write a file at a fresh device-side path, pulls it back,
 * then removes the device copy whether or not the pull succeeded.
 */
async function captureToArtifact(
  context: OperationContext,
  target: DeviceTarget,
  extension: string,
  produce: (remotePath: string) => Promise<void>
): Promise<Artifact> {
  const remotePath = deviceStagingPath(extension);
  try {
    await produce(remotePath);
    return await context.session.pull(target, remotePath, { timeoutMs: context.timeoutMs() });
  } finally {
    await context.session.removeRemote(target, remotePath);
  }
}

export async function dumpUiXml(context: OperationContext, target: DeviceTarget): Promise<string> {
  const artifact = await captureToArtifact(context, target, 'xml', async remotePath => {
    await context.session.shell(target, `uiautomator dump ${escapeShellArg(remotePath)}`, {
      timeoutMs: context.timeoutMs(),
    });
  });
  return artifact.data.toString('utf-8');
}

export function nodeToJson(node: UiNode): JsonValue {
  return {
    text: node.text,
    resourceId: node.resourceId,
    className: node.className,
    contentDesc: node.contentDesc,
    clickable: node.clickable,
    enabled: node.enabled,
    bounds: node.bounds ? { ...node.bounds } : null,
    center: node.bounds ? centerOfBounds(node.bounds) : null,
  };
}

const criteria = {
  text: z.string().optional().describe('Exact element text'),
  resource_id: z.string().optional().describe('Exact resource id (e.g. com.example:id/login)'),
  content_desc: z.string().optional().describe('Exact content description'),
};

export const captureScreenshot: Operation = defineOperation({
  name: 'capture_screenshot',
  description: 'Capture a PNG screenshot of the device screen',
  input: z.object({ device_id: arg.deviceId() }),
  output: 'binary',
  handler: async (args, context) => {
    const target = await context.device(args.device_id);
    const artifact = await captureToArtifact(context, target, 'png', async remotePath => {
      await context.session.shell(target, `screencap -p ${escapeShellArg(remotePath)}`, {
        timeoutMs: context.timeoutMs(),
      });
    });

    const meta: { [key: string]: JsonValue } = { deviceId: target.id };
    try {
      const { width, height } = getPNGDimensions(artifact.data);
      meta.width = width;
      meta.height = height;
    } catch (error) {
      log.debug('screenshot is not a PNG, dimensions omitted', {
        deviceId: target.id,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    return { kind: 'binary', artifact: { ...artifact, name: 'screenshot.png' }, meta };
  },
});

export const getUiHierarchy: Operation = defineOperation({
  name: 'get_ui_hierarchy',
  description: 'Dump the current UI hierarchy as uiautomator XML',
  input: z.object({ device_id: arg.deviceId() }),
  output: 'text',
  handler: async (args, context) => {
    const target = await context.device(args.device_id);
    return { kind: 'text', text: (await dumpUiXml(context, target)).trim() };
  },
});

export const findElement: Operation = defineOperation({
  name: 'find_element',
  description: 'Find UI elements whose attributes all match the given values',
  input: z.object({
    device_id: arg.deviceId(),
    ...criteria,
    class_name: z.string().optional().describe('Exact widget class (e.g. android.widget.Button)'),
  }),
  output: 'json',
  requireOneOf: ['text', 'resource_id', 'class_name', 'content_desc'],
  handler: async (args, context) => {
    const target = await context.device(args.device_id);
    const matches = findNodes(extractUiNodes(await dumpUiXml(context, target)), {
      text: args.text,
      resourceId: args.resource_id,
      className: args.class_name,
      contentDesc: args.content_desc,
    });

    return {
      kind: 'json',
      data: { deviceId: target.id, count: matches.length, matches: matches.map(nodeToJson) },
    };
  },
});

export const tapElement: Operation = defineOperation({
  name: 'tap_element',
  description: 'Find a UI element and tap the centre of the first match',
  input: z.object({ device_id: arg.deviceId(), ...criteria }),
  output: 'json',
  requireOneOf: ['text', 'resource_id', 'content_desc'],
  handler: async (args, context) => {
    const target = await context.device(args.device_id);
    const matches = findNodes(extractUiNodes(await dumpUiXml(context, target)), {
      text: args.text,
      resourceId: args.resource_id,
      contentDesc: args.content_desc,
    });

    const element = matches.find(node => node.bounds);
    if (!element?.bounds) {
      return {
        kind: 'json',
        data: { deviceId: target.id, tapped: false, matches: matches.length },
      };
    }

    const { x, y } = centerOfBounds(element.bounds);
    await context.session.shell(target, `input tap ${x} ${y}`);
    return {
      kind: 'json',
      data: { deviceId: target.id, tapped: true, x, y, element: nodeToJson(element) },
    };
  },
});
