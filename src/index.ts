import http from 'node:http';
import { pathToFileURL } from 'node:url';
import { loadConfig } from './config.js';
import { SendGridMailer } from './email.js';
import { InvalidInputError } from './errors.js';
import { DaycareFinder } from './finder.js';
import { GoogleDistanceMatrix, GoogleGeocoder } from './google.js';
import { errorMessage, logger, type Logger } from './log.js';
import type { SearchOutcome, ShortlistOutcome } from './types.js';

type ResponseHeaders = Record<string, string>;

const BODY_LIMIT_BYTES = 1024 * 64;

const SEARCH_STATUS_CODES: Record<SearchOutcome['status'], number> = {
  ok: 200,
  invalid: 400,
  not_found: 422,
  unavailable: 503,
  error: 500
};

const SHORTLIST_STATUS_CODES: Record<ShortlistOutcome['status'], number> = {
  sent: 200,
  rejected: 400,
  failed: 502
};

class PayloadTooLargeError extends Error {
  constructor() {
    super('Payload too large');
    this.name = 'PayloadTooLargeError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

function sendJson(
  res: http.ServerResponse,
  statusCode: number,
  payload: unknown,
  extraHeaders: ResponseHeaders = {}
): void {
  const body = JSON.stringify(payload);
  res.writeHead(statusCode, {
    'Content-Type': 'application/json; charset=utf-8',
    'Content-Length': Buffer.byteLength(body).toString(),
    ...extraHeaders
  });
  res.end(body);
}

function parseRequestBody(req: http.IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let total = 0;
    let tooLarge = false;

    // Past the limit the body is drained, not buffered; the 413 goes out on 'end'.
    req.on('data', (chunk: Buffer) => {
      total += chunk.length;
      if (total > BODY_LIMIT_BYTES) {
        tooLarge = true;
        chunks.length = 0;
        return;
      }
      chunks.push(chunk);
    });

    req.on('error', (error) => reject(error));

    req.on('end', () => {
      if (tooLarge) {
        reject(new PayloadTooLargeError());
        return;
      }
      try {
        const raw = Buffer.concat(chunks).toString('utf-8') || '{}';
        resolve(JSON.parse(raw));
      } catch {
        reject(new InvalidInputError(['Request body must be valid JSON']));
      }
    });
  });
}

function handleError(res: http.ServerResponse, error: unknown, log: Logger): void {
  if (error instanceof InvalidInputError) {
    sendJson(res, 400, { error: error.message, details: error.details });
    return;
  }

  if (error instanceof PayloadTooLargeError) {
    sendJson(res, 413, { error: error.message });
    return;
  }

  log.error('Unhandled server error', { error: errorMessage(error) });
  sendJson(res, 500, { error: 'Internal server error' });
}

export function createServer(finder: DaycareFinder, log: Logger = logger): http.Server {
  return http.createServer(async (req, res) => {
    const url = req.url ? new URL(req.url, 'http://localhost') : null;
    const pathname = url?.pathname.toLowerCase() ?? '/';

    try {
      if (req.method === 'GET' && pathname === '/healthz') {
        sendJson(res, 200, { status: 'ok' });
        return;
      }

      if (pathname === '/search' || pathname === '/shortlist') {
        if (req.method !== 'POST') {
          sendJson(res, 405, { error: 'Method not allowed' }, { Allow: 'POST' });
          return;
        }

        const payload = await parseRequestBody(req);
        if (pathname === '/search') {
          const outcome = await finder.search(payload);
          sendJson(res, SEARCH_STATUS_CODES[outcome.status], outcome);
        } else {
          const outcome = await finder.sendShortlist(payload);
          sendJson(res, SHORTLIST_STATUS_CODES[outcome.status], outcome);
        }
        return;
      }

      sendJson(res, 404, { error: 'Not found' });
    } catch (error) {
      handleError(res, error, log);
    }
  });
}

export function createFinder(config = loadConfig(), log: Logger = logger): DaycareFinder {
  return new DaycareFinder({
    config,
    geocoder: new GoogleGeocoder(config, log),
    travelTimes: new GoogleDistanceMatrix(config, log),
    mailer: new SendGridMailer(config, log),
    log
  });
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  return entry !== undefined && import.meta.url === pathToFileURL(entry).href;
}

if (isEntryPoint()) {
  const config = loadConfig();
  const server = createServer(createFinder(config));
  server.listen(config.port, () => {
    logger.info('Server started', { port: config.port, dataDir: config.dataDir });
  });
}
