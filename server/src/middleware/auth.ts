import { Request, Response, NextFunction } from 'express';
import { GameError, HTTP_STATUS, isGameError } from '../lib/errors';
import { verifyInitData, type UserIdentity } from '../lib/initData';

declare module 'express-serve-static-core' {
  interface Request {
    user?: UserIdentity;
  }
}

export interface AuthConfig {
  botToken: string;
  maxAgeSeconds: number;
}

function readInitData(req: Request): string | undefined {
  const header = req.headers['authorization'];
  if (typeof header === 'string' && header.startsWith('tma ')) return header.slice(4);
  const body: unknown = req.body;
  if (typeof body === 'object' && body !== null && 'initData' in body && typeof body.initData === 'string') {
    return body.initData;
  }
  return undefined;
}

export function requireInitData(config: AuthConfig) {
  return (req: Request, res: Response, next: NextFunction) => {
    const raw = readInitData(req);
    if (!raw) {
      return res.status(401).json({ error: 'unauthorized', message: 'initData is required' });
    }
    try {
      req.user = verifyInitData(raw, config.botToken, { maxAgeSeconds: config.maxAgeSeconds });
      return next();
    } catch (err) {
      const code = isGameError(err) ? err.code : 'unauthorized';
      return res.status(HTTP_STATUS[code]).json({ error: code, message: isGameError(err) ? err.message : 'unauthorized' });
    }
  };
}

export function currentUser(req: Request): UserIdentity {
  if (!req.user) throw new GameError('unauthorized', 'request is not authenticated');
  return req.user;
}
