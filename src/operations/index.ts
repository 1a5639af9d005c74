import { z } from 'zod';
import { defineOperation, Operation, OperationRegistry, OperationSpec, ParameterSpec } from '../registry.js';
import { JsonValue } from '../types.js';
import { clearAppData, getLogcat, installApp, launchApp, listPackages, stopApp, uninstallApp } from './apps.js';
import { getDeviceInfo, listDevices } from './device.js';
import { executeShell, pullFile, pushFile } from './files.js';
import { inputText, pressKey, swipe, tapCoordinates } from './input.js';
import { clearProxy, getProxy, installCertificate, setupProxy } from './network.js';
import { captureScreenshot, findElement, getUiHierarchy, tapElement } from './screen.js';

export const LIST_OPERATIONS = 'list_operations';

// Catalog order is the order list_operations reports
export const DEVICE_OPERATIONS: readonly Operation[] = [
  listDevices,
  getDeviceInfo,
  captureScreenshot,
  getUiHierarchy,
  findElement,
  tapCoordinates,
  tapElement,
  swipe,
  inputText,
  pressKey,
  installApp,
  uninstallApp,
  launchApp,
  stopApp,
  clearAppData,
  listPackages,
  getLogcat,
  setupProxy,
  clearProxy,
  getProxy,
  installCertificate,
  executeShell,
  pullFile,
  pushFile,
];

function parameterToJson(parameter: ParameterSpec): JsonValue {
  return {
    name: parameter.name,
    type: parameter.type,
    description: parameter.description,
    required: parameter.required,
    default: parameter.default,
    enum: parameter.enum,
    minimum: parameter.minimum,
    maximum: parameter.maximum,
  };
}

export function specToJson(spec: OperationSpec): JsonValue {
  return {
    name: spec.name,
    description: spec.description,
    parameters: spec.parameters.map(parameterToJson),
    output: spec.output,
    requiresDevice: spec.requiresDevice,
    requireOneOf: spec.requireOneOf,
    exclusive: spec.exclusive,
  };
}

export function buildRegistry(operations: readonly Operation[] = DEVICE_OPERATIONS): OperationRegistry {
  const registry = new OperationRegistry();

  registry.register(
    defineOperation({
      name: LIST_OPERATIONS,
      description: 'Describe every supported operation: parameters, output kind and device requirement',
      input: z.object({}),
      output: 'json',
      requiresDevice: false,
      handler: async () => ({
        kind: 'json',
        data: { operations: registry.describeAll().map(specToJson) },
      }),
    })
  );

  for (const operation of operations) {
    registry.register(operation);
  }

  return registry.seal();
}
