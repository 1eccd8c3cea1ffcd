import http from 'node:http';
import { ValidationError, isVaultError, type VaultErrorCode } from '../shared/errors';
import type { VaultApi } from '../shared/ipc';
import type { TaskQuery } from '../shared/types';
import { readDate, requireObject } from '../shared/validation';
import type { ServerConfig } from './config';

export const MAX_BODY_BYTES = 1024 * 1024;

const STATUS_BY_CODE: Record<VaultErrorCode, number> = {
  VALIDATION_ERROR: 400,
  AUTHENTICATION_FAILED: 401,
  SESSION_LOCKED: 401,
  NOT_FOUND: 404,
  SLOT_CONFLICT: 409,
  VERSION_MISMATCH: 409,
  ALREADY_INITIALIZED: 409,
  LIMIT_EXCEEDED: 429,
  DECRYPTION_FAILED: 500,
  ENVELOPE_CORRUPT: 500,
  STORAGE_UNAVAILABLE: 503,
  LOCK_TIMEOUT: 503
};

export interface ApiRequest {
  method: string;
  pathname: string;
  query: URLSearchParams;
  body: unknown;
}

export interface ApiResponse {
  status: number;
  body: unknown;
}

type Handler = (api: VaultApi, request: ApiRequest, params: string[]) => unknown;

interface Route {
  method: string;
  pattern: RegExp;
  status?: number;
  handle: Handler;
}

const readString = (body: unknown, field: string): string => {
  const value = requireObject(body, 'body')[field];
  if (typeof value !== 'string') {
    throw new ValidationError(field, `${field} must be a string`);
  }
  return value;
};

const readBooleanParam = (query: URLSearchParams, name: string): boolean | undefined => {
  const value = query.get(name);
  if (value === null) {
    return undefined;
  }
  if (value !== 'true' && value !== 'false') {
    throw new ValidationError(name, `${name} must be true or false`);
  }
  return value === 'true';
};

const readTaskQuery = (query: URLSearchParams): TaskQuery => {
  const filter: TaskQuery = {};
  const project = query.get('project');
  if (project !== null) {
    filter.project = project;
  }
  const completed = readBooleanParam(query, 'completed');
  if (completed !== undefined) {
    filter.completed = completed;
  }
  const struckToday = readBooleanParam(query, 'struckToday');
  if (struckToday !== undefined) {
    filter.struckToday = struckToday;
  }
  const scheduledDate = query.get('scheduledDate');
  if (scheduledDate !== null) {
    filter.scheduledDate = readDate(scheduledDate, 'scheduledDate');
  }
  return filter;
};

const decodeParam = (segment: string): string => {
  try {
    return decodeURIComponent(segment);
  } catch (error) {
    if (error instanceof URIError) {
      throw new ValidationError('path', `Malformed path segment "${segment}"`);
    }
    throw error;
  }
};

const fieldOf = (body: unknown, field: string): unknown =>
  body === undefined ? undefined : requireObject(body, 'body')[field];

const TASK = '([^/]+)';

const routes: Route[] = [
  {
    method: 'GET',
    pattern: /^\/api\/status$/,
    handle: async (api) => ({ initialized: await api.isInitialized(), unlocked: api.isUnlocked() })
  },
  {
    method: 'POST',
    pattern: /^\/api\/auth\/initialize$/,
    status: 201,
    handle: (api, { body }) => api.initialize(readString(body, 'password'))
  },
  { method: 'POST', pattern: /^\/api\/auth\/login$/, handle: (api, { body }) => api.login(readString(body, 'password')) },
  {
    method: 'POST',
    pattern: /^\/api\/auth\/change-password$/,
    status: 204,
    handle: (api, { body }) => api.changePassword(readString(body, 'oldPassword'), readString(body, 'newPassword'))
  },
  { method: 'POST', pattern: /^\/api\/auth\/logout$/, status: 204, handle: (api) => api.logout() },

  { method: 'GET', pattern: /^\/api\/tasks$/, handle: (api, { query }) => api.listTasks(readTaskQuery(query)) },
  { method: 'POST', pattern: /^\/api\/tasks$/, status: 201, handle: (api, { body }) => api.createTask(body) },
  {
    method: 'POST',
    pattern: /^\/api\/tasks\/import$/,
    handle: (api, { body }) => api.importTasks(fieldOf(body, 'content'), fieldOf(body, 'format'))
  },
  { method: 'GET', pattern: new RegExp(`^/api/tasks/${TASK}$`), handle: (api, _request, [id]) => api.getTask(id) },
  {
    method: 'PATCH',
    pattern: new RegExp(`^/api/tasks/${TASK}$`),
    handle: (api, { body }, [id]) => api.updateTask(id, body)
  },
  { method: 'DELETE', pattern: new RegExp(`^/api/tasks/${TASK}$`), handle: (api, _request, [id]) => api.deleteTask(id) },
  {
    method: 'POST',
    pattern: new RegExp(`^/api/tasks/${TASK}/strike$`),
    handle: (api, { body }, [id]) => api.strikeTask(id, fieldOf(body, 'mode'), fieldOf(body, 'report'))
  },
  {
    method: 'POST',
    pattern: new RegExp(`^/api/tasks/${TASK}/undo-strike$`),
    handle: (api, _request, [id]) => api.undoStrike(id)
  },
  {
    method: 'POST',
    pattern: new RegExp(`^/api/tasks/${TASK}/complete$`),
    handle: (api, _request, [id]) => api.completeTask(id)
  },
  {
    method: 'POST',
    pattern: new RegExp(`^/api/tasks/${TASK}/uncomplete$`),
    handle: (api, _request, [id]) => api.uncompleteTask(id)
  },
  {
    method: 'PUT',
    pattern: new RegExp(`^/api/tasks/${TASK}/schedule$`),
    handle: (api, { body }, [id]) =>
      api.scheduleTask(id, fieldOf(body, 'hour'), fieldOf(body, 'date'), fieldOf(body, 'duration'))
  },
  {
    method: 'DELETE',
    pattern: new RegExp(`^/api/tasks/${TASK}/schedule$`),
    handle: (api, _request, [id]) => api.unscheduleTask(id)
  },
  { method: 'GET', pattern: /^\/api\/planner\/([^/]+)$/, handle: (api, _request, [date]) => api.plannerFor(date) },

  { method: 'GET', pattern: /^\/api\/settings$/, handle: (api) => api.getSettings() },
  { method: 'PATCH', pattern: /^\/api\/settings$/, handle: (api, { body }) => api.updateSettings(body) },

  { method: 'GET', pattern: /^\/api\/backups$/, handle: (api) => api.listBackups() },
  {
    method: 'POST',
    pattern: /^\/api\/backups$/,
    status: 201,
    handle: async (api, { body }) => ({ name: await api.createBackup(fieldOf(body, 'type')) })
  },
  {
    method: 'POST',
    pattern: /^\/api\/backups\/([^/]+)\/restore$/,
    status: 204,
    handle: (api, _request, [name]) => api.restoreBackup(name)
  }
];

export const errorResponse = (error: unknown): ApiResponse => {
  if (isVaultError(error)) {
    return {
      status: STATUS_BY_CODE[error.code],
      body: { error: error.code, message: error.message, details: error.details }
    };
  }
  console.error('Unhandled error while serving request', error);
  return { status: 500, body: { error: 'INTERNAL', message: 'Internal error' } };
};

/** Maps one parsed request onto the API; never throws. */
export const routeRequest = async (api: VaultApi, request: ApiRequest): Promise<ApiResponse> => {
  let pathMatched = false;
  for (const route of routes) {
    const match = route.pattern.exec(request.pathname);
    if (!match) {
      continue;
    }
    pathMatched = true;
    if (route.method !== request.method) {
      continue;
    }
    try {
      const params = match.slice(1).map(decodeParam);
      const result = await route.handle(api, request, params);
      const status = route.status ?? 200;
      return status === 204 ? { status, body: null } : { status, body: result };
    } catch (error) {
      return errorResponse(error);
    }
  }
  return pathMatched
    ? { status: 405, body: { error: 'METHOD_NOT_ALLOWED', message: `${request.method} not allowed` } }
    : { status: 404, body: { error: 'NOT_FOUND', message: `No route for ${request.pathname}` } };
};

const isLoopbackHost = (hostHeader: string | undefined): boolean => {
  if (!hostHeader) {
    return false;
  }
  const hostname = new URL(`http://${hostHeader}`).hostname;
  return hostname === '127.0.0.1' || hostname === 'localhost' || hostname === '[::1]';
};

const readBody = (req: http.IncomingMessage): Promise<unknown> =>
  new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on('data', (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_BYTES) {
        reject(new ValidationError('body', `Request body exceeds ${MAX_BODY_BYTES} bytes`));
        req.destroy();
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => {
      const text = Buffer.concat(chunks).toString('utf8');
      if (text.trim() === '') {
        resolve(undefined);
        return;
      }
      try {
        resolve(JSON.parse(text));
      } catch {
        reject(new ValidationError('body', 'Request body is not valid JSON'));
      }
    });
    req.on('error', reject);
  });

const send = (res: http.ServerResponse, response: ApiResponse) => {
  if (response.status === 204) {
    res.writeHead(204);
    res.end();
    return;
  }
  res.writeHead(response.status, { 'Content-Type': 'application/json', 'Cache-Control': 'no-store' });
  res.end(JSON.stringify(response.body));
};

const handle = async (api: VaultApi, req: http.IncomingMessage, res: http.ServerResponse) => {
  // Browsers on other origins can still reach loopback; reject rebound host names.
  let hostAllowed: boolean;
  try {
    hostAllowed = isLoopbackHost(req.headers.host);
  } catch {
    hostAllowed = false;
  }
  if (!hostAllowed) {
    send(res, { status: 403, body: { error: 'FORBIDDEN', message: 'Only loopback hosts are served' } });
    return;
  }
  const url = new URL(req.url ?? '/', 'http://127.0.0.1');
  let body: unknown;
  try {
    body = await readBody(req);
  } catch (error) {
    send(res, errorResponse(error));
    return;
  }
  send(res, await routeRequest(api, { method: req.method ?? 'GET', pathname: url.pathname, query: url.searchParams, body }));
};

/** Starts the loopback JSON API; resolves once listening. */
export const startServer = (api: VaultApi, config: Pick<ServerConfig, 'host' | 'port'>): Promise<http.Server> =>
  new Promise((resolve, reject) => {
    const server = http.createServer((req, res) => {
      handle(api, req, res).catch((error) => {
        console.error('Failed to handle request', error);
        if (!res.headersSent) {
          send(res, { status: 500, body: { error: 'INTERNAL', message: 'Internal error' } });
        } else {
          res.destroy();
        }
      });
    });
    server.once('error', reject);
    server.listen(config.port, config.host, () => {
      server.off('error', reject);
      const address = server.address();
      const port = typeof address === 'object' && address !== null ? address.port : config.port;
      console.info(`TaskVault API listening on http://${config.host}:${port}`);
      resolve(server);
    });
  });
