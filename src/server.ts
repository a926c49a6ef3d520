import { createServer, type IncomingHttpHeaders, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { pathToFileURL } from 'node:url';
import type { HandlerEvent, HandlerResponse } from '@netlify/functions';
import { env } from './config/env';
import { getRuntime, type Runtime } from '../netlify/functions/_runtime';
import type { FunctionHandler } from '../netlify/functions/_utils';
import { createArtifactHandler } from '../netlify/functions/get-artifact';
import { createGenerateHandler } from '../netlify/functions/generate';
import { createJobStatusHandler } from '../netlify/functions/get-job-status';
import { createHealthHandler } from '../netlify/functions/healthz';
import { createLoadModelHandler } from '../netlify/functions/load-model';
import { createCallbackHandler } from '../netlify/functions/provider-callback';
import { createReleaseModelHandler } from '../netlify/functions/release-model';

export interface Route {
  pattern: RegExp;
  handler: FunctionHandler;
}

export function createRoutes(runtime: () => Runtime): Route[] {
  return [
    { pattern: /^\/api\/generate\/?$/, handler: createGenerateHandler(runtime) },
    { pattern: /^\/api\/callback\/[^/]+\/?$/, handler: createCallbackHandler(runtime) },
    { pattern: /^\/api\/jobs\/?$/, handler: createJobStatusHandler(runtime) },
    { pattern: /^\/api\/models\/load\/?$/, handler: createLoadModelHandler(runtime) },
    { pattern: /^\/api\/models\/release\/?$/, handler: createReleaseModelHandler(runtime) },
    { pattern: /^\/api\/artifacts\/?$/, handler: createArtifactHandler(runtime) },
    { pattern: /^\/api\/healthz\/?$/, handler: createHealthHandler(runtime) },
  ];
}

export function resolveRoute(routes: Route[], pathname: string): FunctionHandler | undefined {
  return routes.find((route) => route.pattern.test(pathname))?.handler;
}

function flattenHeaders(headers: IncomingHttpHeaders): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    flat[key] = Array.isArray(value) ? value.join(', ') : value;
  }
  return flat;
}

export interface RawRequest {
  method: string;
  url: string;
  headers: IncomingHttpHeaders;
  body: string;
}

/** Shapes a plain Node request like the event a deployed function receives. */
export function toHandlerEvent(request: RawRequest): HandlerEvent {
  const headers = flattenHeaders(request.headers);
  const url = new URL(request.url, `http://${headers.host || 'localhost'}`);
  const query: Record<string, string> = {};
  const multiQuery: Record<string, string[]> = {};
  for (const [key, value] of url.searchParams) {
    query[key] = value;
    multiQuery[key] = [...(multiQuery[key] ?? []), value];
  }

  return {
    rawUrl: url.toString(),
    rawQuery: url.search.replace(/^\?/, ''),
    path: url.pathname,
    httpMethod: request.method.toUpperCase(),
    headers,
    multiValueHeaders: Object.fromEntries(Object.entries(headers).map(([key, value]) => [key, [value]])),
    queryStringParameters: query,
    multiValueQueryStringParameters: multiQuery,
    body: request.body || null,
    isBase64Encoded: false,
  };
}

async function readBody(req: IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf8');
}

function send(res: ServerResponse, response: HandlerResponse): void {
  for (const [key, value] of Object.entries(response.headers ?? {})) {
    res.setHeader(key, String(value));
  }
  res.statusCode = response.statusCode;
  const body = response.body ?? '';
  res.end(response.isBase64Encoded ? Buffer.from(body, 'base64') : body);
}

export function createApp(runtime: () => Runtime = getRuntime): Server {
  const routes = createRoutes(runtime);

  return createServer(async (req, res) => {
    const started = Date.now();
    const { logger } = runtime();
    try {
      if (!req.url || !req.method) {
        send(res, { statusCode: 400, body: JSON.stringify({ ok: false, error: 'invalid request' }) });
        return;
      }
      const event = toHandlerEvent({ method: req.method, url: req.url, headers: req.headers, body: await readBody(req) });
      const handler = resolveRoute(routes, event.path);
      if (!handler) {
        send(res, {
          statusCode: 404,
          headers: { 'Content-Type': 'application/json; charset=utf-8' },
          body: JSON.stringify({ ok: false, error: 'not found' }),
        });
        return;
      }
      const response = await handler(event);
      send(res, response);
      logger.info(
        { method: event.httpMethod, path: event.path, status: response.statusCode, durationMs: Date.now() - started },
        'Request handled'
      );
    } catch (error) {
      logger.error({ method: req.method, url: req.url, err: error }, 'Request failed');
      if (!res.headersSent) {
        send(res, { statusCode: 500, body: JSON.stringify({ ok: false, error: 'internal error' }) });
      }
    }
  });
}

export async function start(): Promise<Server> {
  const runtime = getRuntime();
  const server = createApp(() => runtime);

  await new Promise<void>((resolve) => server.listen(env.PORT, env.HOST, resolve));
  runtime.logger.info({ host: env.HOST, port: env.PORT, pollMode: env.TIMINGS.pollMode }, 'render-relay listening');

  const shutdown = (signal: NodeJS.Signals) => {
    runtime.logger.info({ signal }, 'Shutting down');
    server.close();
    const release = runtime.slot ? runtime.slot.release() : Promise.resolve();
    void release
      .catch((error: unknown) => runtime.logger.error({ err: error }, 'Failed to release local model'))
      .finally(() => process.exit(0));
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
  return server;
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  start().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
}
