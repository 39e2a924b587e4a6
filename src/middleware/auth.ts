import type { FastifyRequest, FastifyReply } from 'fastify';
import type { AuthService, JWTPayload } from '../services/AuthService.js';

declare module 'fastify' {
  interface FastifyRequest {
    user?: JWTPayload;
  }
}

const PUBLIC_PATHS = new Set(['/', '/health', '/api/auth/login']);

export function bearerToken(header: string | undefined): string | null {
  if (!header || !header.startsWith('Bearer ')) return null;
  return header.substring(7);
}

export function createAuthMiddleware(authService: AuthService) {
  return async function authMiddleware(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | void> {
    // Skip auth if disabled
    if (!authService.isEnabled()) {
      return;
    }

    const path = request.url.split('?')[0];
    if (PUBLIC_PATHS.has(path)) {
      return;
    }

    const token = bearerToken(request.headers.authorization);
    if (!token) {
      return reply.status(401).send({ error: 'Missing or invalid authorization header' });
    }

    try {
      request.user = authService.verifyToken(token);
    } catch {
      return reply.status(401).send({ error: 'Invalid or expired token' });
    }
  };
}

export function extractTokenFromUrl(url: string): string | null {
  try {
    const urlObj = new URL(url, 'http://localhost');
    return urlObj.searchParams.get('token');
  } catch {
    return null;
  }
}
