import readline from 'readline';
import type { Readable, Writable } from 'stream';
import { OperationContext, OperationRegistry } from './registry.js';
import { encodeResult } from './utils/artifact.js';
import { isDeviceError, toDispatchError, toErrorPayload } from './utils/error.js';
import { log } from './utils/log.js';
import { Request, Response, ValidationError } from './types.js';

export type ConnectionState = 'AwaitingRequest' | 'Validating' | 'Executing' | 'Encoding' | 'Closed';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseRequest(message: unknown): Request {
  if (!isRecord(message)) {
    throw new ValidationError('malformedRequest', 'Request must be a JSON object');
  }
  if (typeof message.op !== 'string' || message.op === '') {
    throw new ValidationError('malformedRequest', "Request field 'op' must be a non-empty string", 'op');
  }
  if (message.args !== undefined && !isRecord(message.args)) {
    throw new ValidationError('malformedRequest', "Request field 'args' must be an object", 'args');
  }

  return { op: message.op, args: message.args ?? {} };
}

/**
 * Turns one request into one response. Stateless apart from the shared,
 * read-only registry, so a single instance serves every connection.
 */
export class Dispatcher {
  constructor(
    private readonly registry: OperationRegistry,
    private readonly context: OperationContext
  ) {}

  async dispatch(message: unknown, onState?: (state: ConnectionState) => void): Promise<Response> {
    onState?.('Validating');

    let request: Request;
    try {
      request = parseRequest(message);
    } catch (error) {
      return { ok: false, error: toErrorPayload(error) };
    }

    const validation = this.registry.validate(request.op, request.args);
    if (!validation.ok) {
      log.debug('rejected request', { op: request.op, reason: validation.error.reason });
      return { ok: false, error: toErrorPayload(validation.error) };
    }

    const started = Date.now();
    try {
      onState?.('Executing');
      const result = await validation.invoke(this.context);
      onState?.('Encoding');
      const encoded = encodeResult(result, this.context.config.maxArtifactBytes);
      log.debug('operation completed', { op: request.op, ms: Date.now() - started });
      return { ok: true, result: encoded };
    } catch (error) {
      const normalized = toDispatchError(error);
      const fields = { op: request.op, kind: normalized.kind, message: normalized.message };
      if (normalized.kind === 'InternalError') {
        log.error('operation raised an unexpected error', fields);
      } else if (isDeviceError(normalized)) {
        log.info('operation could not reach a device', fields);
      } else {
        log.warn('operation failed', fields);
      }
      onState?.('Encoding');
      return { ok: false, error: toErrorPayload(normalized) };
    }
  }

  // A line that is not JSON still gets a response
  async dispatchLine(line: string, onState?: (state: ConnectionState) => void): Promise<Response> {
    let message: unknown;
    try {
      message = JSON.parse(line);
    } catch (error) {
      onState?.('Validating');
      return {
        ok: false,
        error: toErrorPayload(
          new ValidationError(
            'malformedRequest',
            `Request is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
          )
        ),
      };
    }
    return this.dispatch(message, onState);
  }
}

function writeLine(output: Writable, line: string): Promise<void> {
  return new Promise((resolve, reject) => {
    output.write(`${line}\n`, error => (error ? reject(error) : resolve()));
  });
}

/**
 * One newline-delimited JSON conversation. Requests are handled strictly one
 * at a time: the next line is not dispatched until the previous response has
 * been written.
 */
export class Connection {
  state: ConnectionState = 'AwaitingRequest';
  handled = 0;

  constructor(
    private readonly dispatcher: Dispatcher,
    private readonly input: Readable,
    private readonly output: Writable,
    readonly label = 'stdio'
  ) {}

  async run(): Promise<void> {
    const lines = readline.createInterface({ input: this.input, crlfDelay: Infinity });
    const onState = (state: ConnectionState) => {
      this.state = state;
    };

    log.info('connection opened', { connection: this.label });
    try {
      for await (const line of lines) {
        if (!line.trim()) continue;

        const response = await this.dispatcher.dispatchLine(line, onState);
        await writeLine(this.output, JSON.stringify(response));
        this.handled++;
        this.state = 'AwaitingRequest';
      }
    } catch (error) {
      log.warn('connection failed', {
        connection: this.label,
        error: error instanceof Error ? error.message : String(error),
      });
    } finally {
      lines.close();
      this.state = 'Closed';
      log.info('connection closed', { connection: this.label, handled: this.handled });
    }
  }
}
