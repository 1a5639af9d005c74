import fs from 'fs';
import net from 'net';
import path from 'path';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  CallToolRequest,
  CallToolRequestSchema,
  CallToolResult,
  ListToolsRequestSchema,
  Tool,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { Config } from './config.js';
import { Connection, Dispatcher } from './dispatcher.js';
import { buildRegistry } from './operations/index.js';
import { OperationContext, OperationRegistry, OperationSpec, ParameterSpec } from './registry.js';
import { DeviceSession } from './utils/adb.js';
import { formatErrorPayload } from './utils/error.js';
import { log } from './utils/log.js';
import { ChildProcessExecutor, ProcessExecutor, Semaphore } from './utils/process.js';
import { JsonValue, Response } from './types.js';

export const SERVER_NAME = 'android-device-dispatch';

const PackageJsonSchema = z.object({ version: z.string() });

export function packageVersion(): string {
  const raw = fs.readFileSync(path.join(__dirname, '..', 'package.json'), 'utf-8');
  return PackageJsonSchema.parse(JSON.parse(raw)).version;
}

export interface Runtime {
  config: Config;
  session: DeviceSession;
  registry: OperationRegistry;
  context: OperationContext;
  dispatcher: Dispatcher;
}

export function createRuntime(
  config: Config,
  executor: ProcessExecutor = new ChildProcessExecutor({
    defaultTimeoutMs: config.timeoutSeconds * 1000,
    maxConcurrent: config.maxProcesses,
  })
): Runtime {
  const session = new DeviceSession(executor, {
    adbPath: config.adbPath,
    defaultDevice: config.defaultDevice,
    maxArtifactBytes: config.maxArtifactBytes,
  });
  const registry = buildRegistry();
  const context: OperationContext = {
    session,
    config,
    device: explicitId => session.selectDevice(explicitId),
    timeoutMs: seconds => (seconds ?? config.timeoutSeconds) * 1000,
  };

  return { config, session, registry, context, dispatcher: new Dispatcher(registry, context) };
}

function parameterSchema(parameter: ParameterSpec): Record<string, unknown> {
  const schema: Record<string, unknown> = {
    type: parameter.type,
    description: parameter.description,
  };
  if (parameter.enum) schema.enum = parameter.enum;
  if (parameter.default !== undefined) schema.default = parameter.default;
  if (parameter.minimum !== undefined) schema.minimum = parameter.minimum;
  if (parameter.maximum !== undefined) schema.maximum = parameter.maximum;
  return schema;
}

export function toolFromSpec(spec: OperationSpec): Tool {
  const properties: Record<string, Record<string, unknown>> = {};
  for (const parameter of spec.parameters) {
    properties[parameter.name] = parameterSchema(parameter);
  }

  return {
    name: spec.name,
    description: spec.description,
    inputSchema: {
      type: 'object',
      properties,
      required: spec.parameters.filter(parameter => parameter.required).map(parameter => parameter.name),
    },
  };
}

function isJsonObject(value: JsonValue): value is { [key: string]: JsonValue | undefined } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function toToolResult(response: Response): CallToolResult {
  if (!response.ok) {
    return {
      content: [{ type: 'text', text: formatErrorPayload(response.error) }],
      isError: true,
    };
  }

  const { result } = response;
  if (typeof result === 'string') {
    return { content: [{ type: 'text', text: result }] };
  }

  if (
    isJsonObject(result) &&
    result.encoding === 'base64' &&
    typeof result.data === 'string' &&
    typeof result.mimeType === 'string' &&
    result.mimeType.startsWith('image/')
  ) {
    const meta = Object.fromEntries(Object.entries(result).filter(([key]) => key !== 'data'));
    return {
      content: [
        { type: 'image', data: result.data, mimeType: result.mimeType },
        { type: 'text', text: JSON.stringify(meta) },
      ],
    };
  }

  return { content: [{ type: 'text', text: JSON.stringify(result) }] };
}

/**
 * Exposes the operation registry as MCP tools. Every call goes through the
 * same dispatcher as the line protocol.
 */
export class DeviceMcpServer {
  private server: Server;
  // one tool call in flight at a time, like a line-protocol connection
  private readonly inFlight = new Semaphore(1);

  constructor(private readonly runtime: Runtime, version = packageVersion()) {
    this.server = new Server(
      {
        name: SERVER_NAME,
        version,
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.setupToolHandlers();
  }

  private setupToolHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      const tools: Tool[] = this.runtime.registry.describeAll().map(toolFromSpec);
      return { tools };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request: CallToolRequest) => {
      const { name, arguments: args } = request.params;
      const release = await this.inFlight.acquire();
      try {
        const response = await this.runtime.dispatcher.dispatch({ op: name, args: args ?? {} });
        return toToolResult(response);
      } finally {
        release();
      }
    });
  }

  async connect(transport: Transport): Promise<void> {
    await this.server.connect(transport);
  }

  async close(): Promise<void> {
    await this.server.close();
  }

  async run(): Promise<void> {
    await this.connect(new StdioServerTransport());
    log.info('MCP server started on stdio', { operations: this.runtime.registry.describeAll().length });
  }
}

export function serveLineOverStdio(runtime: Runtime): Promise<void> {
  log.info('line protocol server started on stdio');
  return new Connection(runtime.dispatcher, process.stdin, process.stdout).run();
}

// Each socket gets its own dispatch loop; only the registry is shared
export function serveLineOverTcp(runtime: Runtime, port: number, host = '127.0.0.1'): Promise<net.Server> {
  const server = net.createServer(socket => {
    const label = `${socket.remoteAddress}:${socket.remotePort}`;
    socket.on('error', error => log.warn('socket error', { connection: label, error: error.message }));

    const connection = new Connection(runtime.dispatcher, socket, socket, label);
    connection.run().then(
      () => socket.end(),
      error => log.error('connection loop crashed', { connection: label, error: String(error) })
    );
  });

  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      log.info('line protocol server listening', { host, port });
      resolve(server);
    });
  });
}
