import type { FastifyInstance } from 'fastify';
import { bearerToken } from '../middleware/auth.js';
import type { AuthService } from '../services/AuthService.js';

interface LoginBody {
  username: string;
  password: string;
}

export async function authRoutes(app: FastifyInstance, authService: AuthService) {
  // Login endpoint
  app.post<{ Body: LoginBody }>('/api/auth/login', {
    schema: {
      body: {
        type: 'object',
        required: ['username', 'password'],
        properties: {
          username: { type: 'string', minLength: 1 },
          password: { type: 'string', minLength: 1 },
        },
      },
    },
  }, async (request, reply) => {
    const { username, password } = request.body;

    const valid = await authService.validateCredentials(username, password);

    if (!valid) {
      reply.status(401);
      return { error: 'Invalid credentials' };
    }

    return authService.generateToken(username);
  });

  // Token refresh endpoint
  app.post('/api/auth/refresh', async (request, reply) => {
    const token = bearerToken(request.headers.authorization);

    if (!token) {
      reply.status(401);
      return { error: 'Missing authorization header' };
    }

    try {
      const payload = authService.verifyToken(token);
      return authService.generateToken(payload.sub);
    } catch {
      reply.status(401);
      return { error: 'Invalid token' };
    }
  });

  // Check auth status
  app.get('/api/auth/status', async (request) => {
    return {
      enabled: authService.isEnabled(),
      user: request.user?.sub ?? null,
    };
  });
}
