import jwt from 'jsonwebtoken';
import bcrypt from 'bcrypt';
import type { AuthConfig } from '../config/index.js';

export interface JWTPayload {
  sub: string;
  iat: number;
  exp: number;
}

export interface LoginResponse {
  token: string;
  expiresAt: string;
}

/** Guards the admin API. SSH logins do not go through here. */
export class AuthService {
  private config: AuthConfig;

  constructor(config: AuthConfig) {
    this.config = config;
  }

  isEnabled(): boolean {
    return this.config.enabled && this.config.passwordHash !== '';
  }

  async validateCredentials(username: string, password: string): Promise<boolean> {
    if (!this.isEnabled()) {
      return true; // Auth disabled
    }

    if (username !== this.config.username) {
      return false;
    }

    return bcrypt.compare(password, this.config.passwordHash);
  }

  generateToken(username: string, now: Date = new Date()): LoginResponse {
    const iat = Math.floor(now.getTime() / 1000);
    const exp = iat + this.config.tokenExpiry;

    const payload: JWTPayload = { sub: username, iat, exp };

    const token = jwt.sign(payload, this.config.secret);
    const expiresAt = new Date(exp * 1000).toISOString();

    return { token, expiresAt };
  }

  verifyToken(token: string): JWTPayload {
    const payload = jwt.verify(token, this.config.secret);
    if (typeof payload === 'string' || typeof payload.sub !== 'string') {
      throw new Error('Malformed token payload');
    }
    return { sub: payload.sub, iat: payload.iat ?? 0, exp: payload.exp ?? 0 };
  }

  async hashPassword(password: string): Promise<string> {
    return bcrypt.hash(password, 10);
  }
}
