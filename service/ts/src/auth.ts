import type { Request, RequestHandler } from 'express';
import jwt from 'jsonwebtoken';
import type { JwtPayload } from 'jsonwebtoken';

import type { ServiceConfig } from './config.js';

export type AuthConfig = ServiceConfig['auth'];

export interface AuthGuards {
  disabled: boolean;
  requireAuth: RequestHandler;
  requireScope: (scope: string) => RequestHandler;
  hasScope: (req: Request, scope: string) => boolean;
}

const passthrough: RequestHandler = (_req, _res, next) => next();

const scopesOf = (payload: JwtPayload | undefined): string[] => {
  const scope: unknown = payload?.scope;
  if (typeof scope === 'string') return scope.split(' ').filter(Boolean);
  if (Array.isArray(scope)) return scope.filter((value): value is string => typeof value === 'string');
  return [];
};

/**
 * Bearer token guards for the ingestion surface. Tokens are HS256 and signed
 * with the shared secret; {@link signIngestToken} issues them.
 */
export const createAuth = (config: AuthConfig): AuthGuards => {
  const payloads = new WeakMap<Request, JwtPayload>();
  const secret = config.sharedSecret;

  if (config.disabled || !secret) {
    return {
      disabled: true,
      requireAuth: passthrough,
      requireScope: () => passthrough,
      hasScope: () => true,
    };
  }

  const verifyOptions: jwt.VerifyOptions = { algorithms: ['HS256'] };
  if (config.audience) verifyOptions.audience = config.audience;
  if (config.issuer) verifyOptions.issuer = config.issuer;

  const requireAuth: RequestHandler = (req, res, next) => {
    const authHeader = req.headers.authorization;
    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      return res.status(401).send({ error: 'missing_token', message: 'Authorization header missing bearer token.' });
    }

    try {
      const payload = jwt.verify(authHeader.slice('Bearer '.length), secret, verifyOptions);
      if (typeof payload === 'string') {
        return res.status(401).send({ error: 'invalid_token', message: 'Invalid or expired token.' });
      }
      payloads.set(req, payload);
      return next();
    } catch (err) {
      console.warn('auth_invalid_token', { message: err instanceof Error ? err.message : String(err) });
      return res.status(401).send({ error: 'invalid_token', message: 'Invalid or expired token.' });
    }
  };

  const hasScope = (req: Request, scope: string) => scopesOf(payloads.get(req)).includes(scope);

  const requireScope =
    (scope: string): RequestHandler =>
    (req, res, next) => {
      if (!hasScope(req, scope)) {
        return res.status(403).send({ error: 'insufficient_scope', required: scope });
      }
      return next();
    };

  return { disabled: false, requireAuth, requireScope, hasScope };
};

export const INGEST_SCOPE = 'notifications:write';

export interface IngestTokenOptions {
  subject: string;
  scopes?: string[];
  expiresInSeconds?: number;
  now?: () => Date;
}

export interface IngestToken {
  token: string;
  scopes: string[];
  expiresAt: string;
}

/** Signs a token the guards built from the same `config` accept. */
export const signIngestToken = (config: AuthConfig, options: IngestTokenOptions): IngestToken => {
  if (!config.sharedSecret) {
    throw new Error('AUTH_DEV_SHARED_SECRET is not set; there is no key to sign with.');
  }

  const scopes = [...new Set(options.scopes?.length ? options.scopes : [INGEST_SCOPE])];
  const issuedAt = Math.floor((options.now?.() ?? new Date()).getTime() / 1000);
  const expiresAt = issuedAt + (options.expiresInSeconds ?? 3600);

  const payload: JwtPayload = { sub: options.subject, scope: scopes.join(' '), iat: issuedAt, exp: expiresAt };
  if (config.audience) payload.aud = config.audience;
  if (config.issuer) payload.iss = config.issuer;

  return {
    token: jwt.sign(payload, config.sharedSecret, { algorithm: 'HS256' }),
    scopes,
    expiresAt: new Date(expiresAt * 1000).toISOString(),
  };
};
