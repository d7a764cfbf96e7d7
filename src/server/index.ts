import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { once } from 'node:events';
import type { AddressInfo } from 'node:net';

import type { PatternController } from '../control/types.js';
import { PatternError, describeError, type Logger } from '../errors.js';
import { listPatterns, parsePatternName } from '../patterns/registry.js';
import type { PatternName } from '../patterns/types.js';

type JsonValue = Record<string, unknown>;

export type ControlResponse = {
  status: number;
  body: JsonValue;
};

class BadRequestError extends Error {}

const readJsonBody = async (req: IncomingMessage): Promise<unknown> => {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  if (chunks.length === 0) {
    return {};
  }
  const payload = Buffer.concat(chunks).toString('utf8');
  try {
    return JSON.parse(payload);
  } catch (error) {
    throw new BadRequestError(`Invalid JSON payload: ${describeError(error)}`);
  }
};

const writeJson = (res: ServerResponse, status: number, body: JsonValue) => {
  const payload = JSON.stringify(body, null, 2);
  res.statusCode = status;
  res.setHeader('Content-Type', 'application/json');
  res.setHeader('Content-Length', Buffer.byteLength(payload, 'utf8'));
  res.end(payload);
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** Routes one request against the controller; independent of node:http. */
export const routeControlRequest = (
  method: string,
  pathname: string,
  body: unknown,
  controller: PatternController,
): ControlResponse => {
  if (method === 'GET' && pathname === '/health') {
    return { status: 200, body: { status: 'ok' } };
  }

  if (method === 'GET' && pathname === '/patterns') {
    return {
      status: 200,
      body: { status: 'ok', active: controller.currentPattern(), patterns: listPatterns() },
    };
  }

  if (method === 'GET' && pathname === '/status') {
    return { status: 200, body: { status: 'ok', ...controller.status() } };
  }

  if (method === 'POST' && pathname === '/pattern') {
    const requested = isRecord(body) ? body.pattern : undefined;
    if (typeof requested !== 'string' && typeof requested !== 'number') {
      return {
        status: 400,
        body: { status: 'error', message: 'pattern requires a "pattern" name or 1-based index.' },
      };
    }
    let pattern: PatternName;
    try {
      pattern = parsePatternName(requested);
    } catch (error) {
      if (error instanceof PatternError) {
        return { status: 400, body: { status: 'error', message: error.message } };
      }
      throw error;
    }
    if (!controller.requestPattern(pattern)) {
      return { status: 409, body: { status: 'error', message: 'Session is stopping; pattern unchanged.' } };
    }
    return { status: 202, body: { status: 'ok', pattern } };
  }

  return { status: 404, body: { status: 'error', message: 'Not found' } };
};

export type ControlServerOptions = {
  controller: PatternController;
  port?: number;
  host?: string;
  logger?: Logger;
};

export const startControlServer = async (options: ControlServerOptions): Promise<Server> => {
  const port = options.port ?? 8787;
  const host = options.host ?? '127.0.0.1';
  const logger = options.logger ?? console;

  const server = createServer(async (req, res) => {
    if (!req.url || !req.method) {
      writeJson(res, 404, { status: 'error', message: 'Not found' });
      return;
    }

    const url = new URL(req.url, `http://${req.headers.host ?? `${host}:${port}`}`);
    try {
      const body = req.method === 'POST' ? await readJsonBody(req) : undefined;
      const response = routeControlRequest(req.method, url.pathname, body, options.controller);
      writeJson(res, response.status, response.body);
    } catch (error) {
      if (error instanceof BadRequestError) {
        writeJson(res, 400, { status: 'error', message: error.message });
        return;
      }
      logger.error('[control] request failed', error);
      writeJson(res, 500, { status: 'error', message: describeError(error) });
    }
  });

  server.listen(port, host);
  await once(server, 'listening');
  const address = server.address();
  const boundPort = isAddressInfo(address) ? address.port : port;
  logger.log(`[control] listening on http://${host}:${boundPort}`);
  return server;
};

const isAddressInfo = (value: unknown): value is AddressInfo =>
  isRecord(value) && typeof value.port === 'number';

export const closeControlServer = async (server: Server): Promise<void> => {
  if (!server.listening) return;
  const closed = once(server, 'close');
  server.close();
  server.closeAllConnections();
  await closed;
};
