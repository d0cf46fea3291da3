import { FastifyInstance, FastifyReply } from 'fastify';
import { StorageSession } from '../services/storage-session.js';
import { AppConfig, ErrorCode, FailureCode, StorageError } from '../types/index.js';

export const API_KEY_HEADER = 'x-api-key';

const STATUS_BY_CODE: Record<FailureCode, number> = {
  [ErrorCode.InvalidInput]: 400,
  [ErrorCode.NotFound]: 404,
  [ErrorCode.PermissionDenied]: 403,
  [ErrorCode.ServerError]: 500,
  [ErrorCode.SetupRequired]: 403,
};

export function statusForError(code: FailureCode): number {
  return STATUS_BY_CODE[code];
}

function sendError(reply: FastifyReply, error: StorageError) {
  reply.code(statusForError(error.code));
  return { success: false, error: error.code, message: error.message };
}

type NotesQuery = { Querystring: { id?: string } };

export async function registerRoutes(
  app: FastifyInstance,
  session: StorageSession,
  config: AppConfig
) {
  // Every route except the health check needs the configured key; unmatched
  // paths fall through to the 404 handler
  app.addHook('onRequest', async (request, reply) => {
    const route = request.routeOptions.url;
    if (!config.apiKey || route === undefined || route === '/health') {
      return;
    }
    if (request.headers[API_KEY_HEADER] !== config.apiKey) {
      reply.code(401);
      return reply.send({ success: false, error: 'Unauthorized', message: 'Missing or invalid API key' });
    }
  });

  // Health check
  app.get('/health', async () => {
    const health = await session.healthCheck();
    return { success: health.ready, status: 'ok', ...health };
  });

  app.get('/status', async () => {
    return session.status();
  });

  app.post<{ Body: { bucket?: unknown } | null }>('/setup', async (request, reply) => {
    const result = await session.setup(request.body?.bucket);
    if (!result.ok) {
      return sendError(reply, result.error);
    }
    const { bucket, mode, degraded, message } = result.value;
    if (degraded) {
      return { success: true, bucket, mode, warning: degraded, message };
    }
    return { success: true, bucket, mode, message };
  });

  app.post<{ Body: { title?: unknown; content?: unknown } | null }>('/notes', async (request, reply) => {
    const result = await session.add(request.body?.title, request.body?.content);
    if (!result.ok) {
      return sendError(reply, result.error);
    }
    const { id, title, content } = result.value;
    reply.code(201);
    return { success: true, id, note: { title, content } };
  });

  // Whole collection without ?id, a single note with it
  app.get<NotesQuery>('/notes', async (request, reply) => {
    const { id } = request.query;
    const result = id === undefined ? await session.get() : await session.get(id);
    if (!result.ok) {
      return sendError(reply, result.error);
    }
    return { success: true, notes: result.value };
  });

  app.delete<NotesQuery>('/notes', async (request, reply) => {
    const { id } = request.query;
    if (id === undefined) {
      return sendError(reply, { code: ErrorCode.InvalidInput, message: 'Query parameter "id" is required' });
    }
    const result = await session.delete(id);
    if (!result.ok) {
      return sendError(reply, result.error);
    }
    return { success: true, ...result.value };
  });
}
