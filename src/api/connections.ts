import type { FastifyInstance } from 'fastify';
import type { ConnectionRegistry } from '../services/ConnectionRegistry.js';
import type { SessionState } from '../types/Connection.js';

const STATES: readonly SessionState[] = ['unauthenticated', 'authenticated', 'channel-requested', 'pty-ready', 'closed'];

function isSessionState(value: string): value is SessionState {
  return (STATES as readonly string[]).includes(value);
}

export async function connectionRoutes(app: FastifyInstance, registry: ConnectionRegistry) {
  // List live SSH connections, optionally by state
  app.get<{ Querystring: { state?: string } }>('/api/connections', async (request, reply) => {
    const { state } = request.query;

    if (state !== undefined && !isSessionState(state)) {
      reply.status(400);
      return { error: `Unknown state: ${state}` };
    }

    const connections = registry.list().filter((c) => state === undefined || c.state === state);
    return { connections };
  });

  // Get single connection
  app.get<{ Params: { id: string } }>('/api/connections/:id', async (request, reply) => {
    const connection = registry.get(request.params.id);

    if (!connection) {
      reply.status(404);
      return { error: 'Connection not found' };
    }

    return { connection };
  });

  // Disconnect a client
  app.delete<{ Params: { id: string } }>('/api/connections/:id', async (request, reply) => {
    if (!registry.disconnect(request.params.id)) {
      reply.status(404);
      return { error: 'Connection not found' };
    }

    return reply.status(204).send();
  });
}
