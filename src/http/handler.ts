import type { IncomingMessage, ServerResponse } from 'node:http';
import { z } from 'zod';
import { login } from '../auth/login.js';
import type { SessionTable } from '../auth/sessions.js';
import { MirrorError, errorMessage, type ErrorCode } from '../errors.js';
import type { RepositoryManager } from '../sync/manager.js';
import type { SyncScheduler } from '../sync/scheduler.js';
import type { SessionToken } from '../types.js';

export interface HandlerDeps {
  manager: RepositoryManager;
  sessions: SessionTable;
  scheduler?: SyncScheduler | null;
}

export type RequestHandler = (req: IncomingMessage, res: ServerResponse) => Promise<void>;

const DEFAULT_PAGE_SIZE = 20;
const MAX_PAGE_SIZE = 100;
const MAX_BODY_BYTES = 64 * 1024;

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  ADAPTER_ERROR: 502,
  SYNC_IN_PROGRESS: 409,
  INVALID_URL: 400,
  ALREADY_EXISTS: 409,
  NOT_FOUND: 404,
  INVALID_CREDENTIALS: 401,
};

const LoginBody = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
});

const AddRepositoryBody = z.object({
  url: z.string().min(1),
});

/** Read the full request body as a string. */
function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on('data', (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_BYTES) {
        reject(new Error('Request body too large'));
        req.destroy();
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => resolve(Buffer.concat(chunks).toString('utf-8')));
    req.on('error', reject);
  });
}

/** Parse JSON body, returning null on failure. */
async function parseJsonBody(req: IncomingMessage): Promise<unknown | null> {
  try {
    const raw = await readBody(req);
    return raw ? JSON.parse(raw) : null;
  } catch {
    return null;
  }
}

function sendJson(res: ServerResponse, data: unknown, status = 200): void {
  res.writeHead(status, {
    'Content-Type': 'application/json',
    'Access-Control-Allow-Origin': '*',
  });
  res.end(JSON.stringify(data));
}

function sendError(res: ServerResponse, message: string, status = 404, code?: string): void {
  sendJson(res, code ? { error: message, code } : { error: message }, status);
}

function sendFailure(res: ServerResponse, error: unknown): void {
  if (error instanceof MirrorError) {
    sendError(res, error.message, STATUS_BY_CODE[error.code], error.code);
    return;
  }
  console.error('Unhandled request error:', error);
  sendError(res, `Internal error: ${errorMessage(error)}`, 500);
}

function bearerToken(req: IncomingMessage): string | null {
  const header = req.headers.authorization;
  if (!header || !header.startsWith('Bearer ')) return null;
  const token = header.slice('Bearer '.length).trim();
  return token || null;
}

function positiveInt(value: string | null, fallback: number): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

/**
 * Build the HTTP request handler for the JSON API.
 *
 * Repository and scheduler routes need `Authorization: Bearer <token>`.
 * Repositories are addressed by their URL-encoded remote URL or id.
 */
export function createRequestHandler(deps: HandlerDeps): RequestHandler {
  const { manager, sessions } = deps;
  const scheduler = deps.scheduler ?? null;

  function authenticate(req: IncomingMessage, res: ServerResponse): SessionToken | null {
    const token = bearerToken(req);
    const session = token ? sessions.validate(token) : null;
    if (!session) {
      sendError(res, 'Unauthorized', 401);
      return null;
    }
    return session;
  }

  async function handleLogin(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const body = LoginBody.safeParse(await parseJsonBody(req));
    if (!body.success) {
      sendError(res, 'username and password are required', 400);
      return;
    }
    const session = await login(sessions, body.data.username, body.data.password);
    console.error(`User ${session.username} logged in`);
    sendJson(res, {
      token: session.token,
      username: session.username,
      expiresAt: new Date(session.expiresAt).toISOString(),
    });
  }

  async function handleAddRepository(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const body = AddRepositoryBody.safeParse(await parseJsonBody(req));
    if (!body.success) {
      sendError(res, 'url is required', 400);
      return;
    }
    const repository = await manager.addRepository(body.data.url);
    if (repository.status === 'error') {
      sendJson(
        res,
        { error: `Failed to clone repository: ${repository.lastError ?? 'unknown error'}`, code: 'ADAPTER_ERROR', repository },
        502,
      );
      return;
    }
    sendJson(res, repository, 201);
  }

  async function handleRepositoryRoute(
    req: IncomingMessage,
    res: ServerResponse,
    segments: string[],
  ): Promise<void> {
    let key: string;
    try {
      key = decodeURIComponent(segments[0]);
    } catch {
      sendError(res, 'Malformed repository key', 400);
      return;
    }
    const repository = manager.resolveRepository(key);

    if (segments.length === 1 && req.method === 'GET') {
      sendJson(res, repository);
      return;
    }

    if (segments.length === 1 && req.method === 'DELETE') {
      const removed = manager.removeRepository(repository.id);
      sendJson(res, { ok: true, localPath: removed.localPath });
      return;
    }

    if (segments.length === 2 && segments[1] === 'sync' && req.method === 'POST') {
      const result = await manager.triggerSync(repository.id);
      sendJson(res, result);
      return;
    }

    sendError(res, 'Not found', 404);
  }

  return async function handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
    const pathname = url.pathname;

    // CORS preflight
    if (req.method === 'OPTIONS') {
      res.writeHead(204, {
        'Access-Control-Allow-Origin': '*',
        'Access-Control-Allow-Methods': 'GET, POST, DELETE, OPTIONS',
        'Access-Control-Allow-Headers': 'Content-Type, Authorization',
      });
      res.end();
      return;
    }

    try {
      if (pathname === '/api/auth/login' && req.method === 'POST') {
        await handleLogin(req, res);
        return;
      }

      if (pathname === '/api/auth/logout' && req.method === 'POST') {
        const session = authenticate(req, res);
        if (!session) return;
        sessions.revoke(session.token);
        sendJson(res, { ok: true });
        return;
      }

      if (pathname === '/api/repositories') {
        if (!authenticate(req, res)) return;

        if (req.method === 'GET') {
          const page = positiveInt(url.searchParams.get('page'), 1);
          const limit = Math.min(positiveInt(url.searchParams.get('limit'), DEFAULT_PAGE_SIZE), MAX_PAGE_SIZE);
          const listing = manager.listRepositories(page, limit);
          sendJson(res, {
            items: listing.items,
            page: listing.page,
            limit: listing.limit,
            total_pages: listing.totalPages,
            total: listing.total,
          });
          return;
        }

        if (req.method === 'POST') {
          await handleAddRepository(req, res);
          return;
        }

        sendError(res, 'Method not allowed', 405);
        return;
      }

      if (pathname.startsWith('/api/repositories/')) {
        if (!authenticate(req, res)) return;
        // Split the raw path so encoded slashes inside the key stay intact
        const segments = pathname.slice('/api/repositories/'.length).split('/').filter(Boolean);
        if (segments.length === 0 || segments.length > 2) {
          sendError(res, 'Not found', 404);
          return;
        }
        await handleRepositoryRoute(req, res, segments);
        return;
      }

      if (pathname === '/api/scheduler' && req.method === 'GET') {
        if (!authenticate(req, res)) return;
        sendJson(res, {
          enabled: scheduler?.isScheduled ?? false,
          state: scheduler?.state ?? 'idle',
          schedule: scheduler?.pattern ?? null,
          nextRun: scheduler?.nextRun()?.toISOString() ?? null,
          lastBatch: scheduler?.lastBatch ?? null,
        });
        return;
      }

      if (pathname === '/api/scheduler/run' && req.method === 'POST') {
        if (!authenticate(req, res)) return;
        if (!scheduler) {
          sendError(res, 'No scheduler configured', 409);
          return;
        }
        const report = await scheduler.runBatch();
        if (!report) {
          sendError(res, 'A sync batch is already running', 409, 'SYNC_IN_PROGRESS');
          return;
        }
        sendJson(res, report);
        return;
      }

      sendError(res, 'Not found', 404);
    } catch (error) {
      sendFailure(res, error);
    }
  };
}
