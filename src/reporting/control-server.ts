/**
 * Control Server - HTTP control surface and live status feed.
 *
 * JSON endpoints drive the pipeline (start, decisions, ask, explain, retry,
 * reset); `/api/stream` pushes a snapshot as a Server-Sent Event on connect
 * and after every state change. Long-running phases are started in the
 * background and answered with 202.
 *
 * Uses only Node's built-in `http` module.
 *
 * @module reporting/control-server
 */

import * as http from 'node:http';
import { z } from 'zod';
import {
  FindingNotFoundError,
  HardenError,
  InputValidationError,
  PhaseTransitionError,
  UnitNotFoundError,
  errorMessage,
} from '../errors.js';
import type { Pipeline } from '../pipeline.js';
import type { PipelineSnapshot } from '../pipeline-state.js';
import type { ActionLogger } from '../storage/action-logger.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ControlServerOptions {
  pipeline: Pipeline;
  /** Source for `/api/actions`; omitted means the endpoint returns `[]`. */
  actionLog?: ActionLogger;
  /** Starting port to try (default: 4567; 0 picks any free port). */
  startPort?: number;
  host?: string;
}

export interface ControlServer {
  url: string;
  port: number;
  /** Resolve once every background run and detached retry has settled. */
  settled(): Promise<void>;
  /** Disconnect stream clients and stop listening. */
  close(): Promise<void>;
}

const MAX_BODY_BYTES = 1024 * 1024;
const DEFAULT_ACTION_LIMIT = 20;

const StartBody = z.object({ reuse: z.boolean().optional() });
const DecisionsBody = z.object({ decisions: z.unknown() });
const AskBody = z.object({ question: z.string().min(1) });
const ExplainBody = z.object({ findingId: z.string().min(1) });

const UNIT_ROUTE = /^\/api\/units\/([^/]+)\/(ask|explain|retry)$/;

// ---------------------------------------------------------------------------
// Server
// ---------------------------------------------------------------------------

export async function startControlServer(options: ControlServerOptions): Promise<ControlServer> {
  const { pipeline, actionLog, startPort = 4567, host = '127.0.0.1' } = options;

  const streams = new Set<http.ServerResponse>();
  const background = new Set<Promise<void>>();

  const runInBackground = (label: string, work: () => Promise<unknown>): void => {
    const task = work()
      .then(() => undefined)
      .catch((error: unknown) => {
        console.error(`[ControlServer] ${label} failed: ${errorMessage(error)}`);
      })
      .finally(() => {
        background.delete(task);
      });
    background.add(task);
  };

  const route = async (req: http.IncomingMessage, res: http.ServerResponse): Promise<void> => {
    const url = new URL(req.url ?? '/', 'http://localhost');
    const method = req.method ?? 'GET';

    if (url.pathname === '/api/status') {
      requireMethod(method, 'GET');
      sendJson(res, 200, pipeline.snapshot());
      return;
    }

    if (url.pathname === '/api/stream') {
      requireMethod(method, 'GET');
      openStream(req, res, pipeline, streams);
      return;
    }

    if (url.pathname === '/api/actions') {
      requireMethod(method, 'GET');
      const limit = parseLimit(url.searchParams.get('limit'));
      sendJson(res, 200, actionLog ? actionLog.readLast(limit) : []);
      return;
    }

    if (url.pathname === '/api/start') {
      requireMethod(method, 'POST');
      const body = parseBody(StartBody, await readJsonBody(req));
      const outcome = pipeline.discover();
      if (!outcome.ok) {
        sendJson(res, 422, { error: { code: 'DISCOVERY_FAILED', message: outcome.error } });
        return;
      }
      runInBackground('Analysis', () => pipeline.runAnalysis({ reuseExisting: body.reuse === true }));
      sendJson(res, 202, { phase: 'analyzing', units: outcome.units });
      return;
    }

    if (url.pathname === '/api/decisions') {
      requireMethod(method, 'POST');
      const body = parseBody(DecisionsBody, await readJsonBody(req));
      const recorded = pipeline.recordDecisions(body.decisions);
      runInBackground('Hardening', () => pipeline.runHardening());
      sendJson(res, 202, { phase: 'hardening', recorded });
      return;
    }

    if (url.pathname === '/api/reset') {
      requireMethod(method, 'POST');
      pipeline.reset();
      sendJson(res, 200, pipeline.snapshot());
      return;
    }

    const unitMatch = UNIT_ROUTE.exec(url.pathname);
    if (unitMatch) {
      requireMethod(method, 'POST');
      const name = decodeUnitName(unitMatch[1]);
      switch (unitMatch[2]) {
        case 'ask': {
          const body = parseBody(AskBody, await readJsonBody(req));
          sendJson(res, 200, await pipeline.askAboutScreen(name, body.question));
          return;
        }
        case 'explain': {
          const body = parseBody(ExplainBody, await readJsonBody(req));
          sendJson(res, 200, await pipeline.explainFinding(name, body.findingId));
          return;
        }
        default:
          sendJson(res, 202, pipeline.retryScreen(name));
          return;
      }
    }

    sendJson(res, 404, { error: { code: 'NOT_FOUND', message: `No route for ${method} ${url.pathname}` } });
  };

  const server = http.createServer((req, res) => {
    route(req, res).catch((error: unknown) => {
      sendError(res, error);
    });
  });

  const listening = await tryListen(server, startPort, host);
  console.log(`[ControlServer] Listening on ${listening.url}`);

  return {
    ...listening,
    settled: async () => {
      while (background.size > 0) {
        await Promise.allSettled([...background]);
      }
      await pipeline.whenIdle();
    },
    close: () => {
      for (const stream of streams) stream.end();
      streams.clear();
      return new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
        server.closeAllConnections();
      });
    },
  };
}

// ---------------------------------------------------------------------------
// Streaming
// ---------------------------------------------------------------------------

function openStream(
  req: http.IncomingMessage,
  res: http.ServerResponse,
  pipeline: Pipeline,
  streams: Set<http.ServerResponse>,
): void {
  res.writeHead(200, {
    'Content-Type': 'text/event-stream',
    'Cache-Control': 'no-cache',
    Connection: 'keep-alive',
  });
  streams.add(res);

  const send = (snapshot: PipelineSnapshot): void => {
    res.write(formatEvent('snapshot', snapshot));
  };
  send(pipeline.snapshot());
  const unsubscribe = pipeline.subscribe(send);

  req.on('close', () => {
    unsubscribe();
    streams.delete(res);
  });
}

export function formatEvent(event: string, data: unknown): string {
  return `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`;
}

// ---------------------------------------------------------------------------
// Request helpers
// ---------------------------------------------------------------------------

class MethodNotAllowed extends Error {}

function requireMethod(actual: string, expected: string): void {
  if (actual !== expected) {
    throw new MethodNotAllowed(`Use ${expected}`);
  }
}

async function readJsonBody(req: http.IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;

  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buf.length;
    if (size > MAX_BODY_BYTES) {
      throw new InputValidationError('Request body too large');
    }
    chunks.push(buf);
  }

  const text = Buffer.concat(chunks).toString('utf-8').trim();
  if (!text) return {};

  try {
    return JSON.parse(text);
  } catch (error) {
    throw new InputValidationError(`Invalid JSON body: ${errorMessage(error)}`);
  }
}

function parseBody<T>(schema: z.ZodType<T>, value: unknown): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new InputValidationError(
      'Invalid request body',
      result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`),
    );
  }
  return result.data;
}

function decodeUnitName(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    throw new InputValidationError(`Malformed unit name: ${segment}`);
  }
}

function parseLimit(value: string | null): number {
  if (value === null) return DEFAULT_ACTION_LIMIT;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InputValidationError(`Invalid limit: ${value}`);
  }
  return n;
}

// ---------------------------------------------------------------------------
// Responses
// ---------------------------------------------------------------------------

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

/**
 * Map an error to its HTTP status and `{ error: { code, message } }` body.
 */
export function errorResponse(error: unknown): { status: number; code: string; message: string } {
  const message = errorMessage(error);
  if (error instanceof MethodNotAllowed) return { status: 405, code: 'METHOD_NOT_ALLOWED', message };
  if (error instanceof UnitNotFoundError || error instanceof FindingNotFoundError) {
    return { status: 404, code: error.code, message };
  }
  if (error instanceof PhaseTransitionError) return { status: 409, code: error.code, message };
  if (error instanceof InputValidationError) return { status: 400, code: error.code, message };
  if (error instanceof HardenError) return { status: 500, code: error.code, message };
  return { status: 500, code: 'INTERNAL_ERROR', message };
}

function sendError(res: http.ServerResponse, error: unknown): void {
  const { status, code, message } = errorResponse(error);
  if (status === 500) {
    console.error(`[ControlServer] ${message}`);
  }
  if (res.headersSent) {
    res.end();
    return;
  }
  sendJson(res, status, { error: { code, message } });
}

function tryListen(
  server: http.Server,
  port: number,
  host: string,
): Promise<{ url: string; port: number }> {
  const MAX_PORT = 65535;

  return new Promise((resolve, reject) => {
    const onError = (err: NodeJS.ErrnoException) => {
      if (err.code === 'EADDRINUSE' && port !== 0 && port < MAX_PORT) {
        server.removeListener('error', onError);
        console.warn(`[ControlServer] Port ${port} in use, trying ${port + 1}`);
        tryListen(server, port + 1, host).then(resolve, reject);
      } else {
        reject(err);
      }
    };

    server.on('error', onError);
    server.listen(port, host, () => {
      server.removeListener('error', onError);
      const address = server.address();
      const bound = typeof address === 'object' && address !== null ? address.port : port;
      resolve({ url: `http://${host}:${bound}`, port: bound });
    });
  });
}
