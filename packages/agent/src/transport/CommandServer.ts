import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import {
  API_KEY_HEADER,
  SERVICE_NAME,
  parseCommandRequest,
  type CommandAck,
  type ErrorResponse,
  type HealthResponse,
  type StatusResponse,
} from '@xray-agent/protocol';
import type { AuthProvider } from '../auth/index.js';
import {
  AgentError,
  BadCommandError,
  NotFoundError,
  PayloadTooLargeError,
  UnauthorizedError,
  errorMessage,
} from '../errors.js';
import { toCommandResult, type CommandQueue } from '../reconcile/CommandQueue.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';

const MAX_BODY_BYTES = 64 * 1024;
const COMMAND_PATH = /^\/commands\/([^/]+)$/;

export interface CommandServerOptions {
  authProvider: AuthProvider;
  queue: Pick<CommandQueue, 'enqueue' | 'get'>;
  status: () => StatusResponse;
  /** Prometheus text for `GET /metrics`. */
  metrics: () => string;
  logger?: Logger;
}

type Handler = (req: IncomingMessage, res: ServerResponse, params: string[]) => Promise<void>;

interface Route {
  method: string;
  pattern: string | RegExp;
  auth: boolean;
  handler: Handler;
}

/**
 * Inbound HTTP interface for the Core API. Commands are acknowledged as
 * soon as they are queued; reconciliation happens afterwards.
 */
export class CommandServer {
  private server: Server | null = null;
  private authProvider: AuthProvider;
  private queue: CommandServerOptions['queue'];
  private status: () => StatusResponse;
  private metrics: () => string;
  private logger: Logger;
  private routes: Route[];

  constructor(options: CommandServerOptions) {
    this.authProvider = options.authProvider;
    this.queue = options.queue;
    this.status = options.status;
    this.metrics = options.metrics;
    this.logger = options.logger ?? rootLogger.child({ component: 'command-server' });

    this.routes = [
      { method: 'GET', pattern: '/health', auth: false, handler: (_req, res) => this.handleHealth(res) },
      { method: 'GET', pattern: '/metrics', auth: false, handler: (_req, res) => this.handleMetrics(res) },
      { method: 'GET', pattern: '/status', auth: true, handler: (_req, res) => this.handleStatus(res) },
      { method: 'POST', pattern: '/commands', auth: true, handler: (req, res) => this.handleCommand(req, res) },
      {
        method: 'GET',
        pattern: COMMAND_PATH,
        auth: true,
        handler: (_req, res, params) => this.handleCommandLookup(res, params[0]),
      },
    ];
  }

  /** Bind and resolve with the actual port (useful with port 0). */
  start(port: number, host: string): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = createServer((req, res) => {
        this.dispatch(req, res).catch((err: unknown) => {
          this.logger.error({ err: errorMessage(err) }, 'Failed to write response');
        });
      });
      this.server = server;

      server.once('error', reject);
      server.listen(port, host, () => {
        server.off('error', reject);
        const address = server.address();
        const bound = typeof address === 'object' && address !== null ? address.port : port;
        this.logger.info({ host, port: bound }, 'Command endpoint listening');
        resolve(bound);
      });
    });
  }

  async close(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeIdleConnections();
    });
  }

  private async dispatch(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url || '/', 'http://localhost');
    const method = req.method ?? 'GET';

    try {
      const match = this.match(method, url.pathname);
      if (!match) {
        throw new NotFoundError(`No route for ${method} ${url.pathname}`);
      }

      if (match.route.auth) {
        const header = req.headers[API_KEY_HEADER.toLowerCase()];
        const result = await this.authProvider.verify(Array.isArray(header) ? header[0] : header);
        if (!result.success) {
          this.logger.warn({ method, path: url.pathname, reason: result.error }, 'Rejected unauthenticated request');
          throw new UnauthorizedError();
        }
      }

      await match.route.handler(req, res, match.params);
    } catch (err) {
      this.sendError(res, err, method, url.pathname);
    }
  }

  private match(method: string, pathname: string): { route: Route; params: string[] } | null {
    for (const route of this.routes) {
      if (route.method !== method) continue;
      if (typeof route.pattern === 'string') {
        if (route.pattern === pathname) return { route, params: [] };
        continue;
      }
      const found = route.pattern.exec(pathname);
      if (found) return { route, params: found.slice(1).map(decodeSegment) };
    }
    return null;
  }

  private async handleHealth(res: ServerResponse): Promise<void> {
    const body: HealthResponse = { status: 'healthy', service: SERVICE_NAME };
    this.sendJson(res, 200, body);
  }

  private async handleMetrics(res: ServerResponse): Promise<void> {
    res.writeHead(200, { 'Content-Type': 'text/plain; version=0.0.4; charset=utf-8' });
    res.end(this.metrics());
  }

  private async handleStatus(res: ServerResponse): Promise<void> {
    this.sendJson(res, 200, this.status());
  }

  private async handleCommand(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const raw = await readBody(req, MAX_BODY_BYTES);

    let body: unknown;
    try {
      body = JSON.parse(raw);
    } catch {
      throw new BadCommandError('Request body must be valid JSON');
    }

    const parsed = parseCommandRequest(body);
    if (!parsed.success) {
      throw new BadCommandError(parsed.error);
    }

    const { id, position } = this.queue.enqueue(parsed.value);
    const ack: CommandAck = { accepted: true, command_id: id, queue_position: position };
    this.sendJson(res, 202, ack);
  }

  private async handleCommandLookup(res: ServerResponse, id: string): Promise<void> {
    const record = this.queue.get(id);
    if (!record) {
      throw new NotFoundError(`Unknown command: ${id}`);
    }
    this.sendJson(res, 200, toCommandResult(record));
  }

  private sendError(res: ServerResponse, err: unknown, method: string, path: string): void {
    let status = 500;
    let body: ErrorResponse = { error: { code: 'E_INTERNAL', message: 'Internal server error' } };

    if (err instanceof AgentError) {
      status = err.statusCode;
      body = { error: { code: err.code, message: err.message } };
    } else {
      this.logger.error({ method, path, err: errorMessage(err) }, 'Request failed');
    }

    if (res.headersSent) {
      res.end();
      return;
    }
    this.sendJson(res, status, body);
  }

  private sendJson(res: ServerResponse, status: number, body: unknown): void {
    const payload = JSON.stringify(body);
    res.writeHead(status, {
      'Content-Type': 'application/json',
      'Content-Length': Buffer.byteLength(payload),
      'Cache-Control': 'no-store',
    });
    res.end(payload);
  }
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    throw new BadCommandError(`Malformed path segment: ${segment}`);
  }
}

function readBody(req: IncomingMessage, limit: number): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;

    // Oversized bodies are still drained so the client receives the 413.
    req.on('data', (chunk: Buffer) => {
      size += chunk.length;
      if (size <= limit) chunks.push(chunk);
    });
    req.on('end', () => {
      if (size > limit) {
        reject(new PayloadTooLargeError(limit));
      } else {
        resolve(Buffer.concat(chunks).toString('utf-8'));
      }
    });
    req.on('error', reject);
  });
}
