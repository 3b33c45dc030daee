import { createHmac, timingSafeEqual } from 'crypto';
import { z } from 'zod';
import { GameError } from './errors';

export interface UserIdentity {
  id: number;
  name: string;
  username?: string;
}

export interface VerifyOptions {
  now?: number; // ms
  maxAgeSeconds?: number;
}

const DEFAULT_MAX_AGE_SECONDS = 24 * 60 * 60;

const userSchema = z.object({
  id: z.number().int().positive(),
  first_name: z.string().default(''),
  last_name: z.string().optional(),
  username: z.string().optional(),
});

export function dataCheckString(params: URLSearchParams): string {
  const pairs: string[] = [];
  params.forEach((value, key) => {
    if (key !== 'hash') pairs.push(`${key}=${value}`);
  });
  return pairs.sort().join('\n');
}

export function signDataCheckString(data: string, botToken: string): string {
  const secret = createHmac('sha256', 'WebAppData').update(botToken).digest();
  return createHmac('sha256', secret).update(data).digest('hex');
}

/**
 * Verifies Mini App `initData` against the bot token and returns the user it
 * was issued to. Throws `unauthorized` for any forged, stale or incomplete
 * payload.
 */
export function verifyInitData(raw: string, botToken: string, opts: VerifyOptions = {}): UserIdentity {
  if (!botToken) throw new GameError('unauthorized', 'bot token is not configured');
  const params = new URLSearchParams(raw);
  const hash = params.get('hash');
  if (!hash) throw new GameError('unauthorized', 'initData has no hash');

  const expected = Buffer.from(signDataCheckString(dataCheckString(params), botToken), 'hex');
  const given = Buffer.from(hash, 'hex');
  if (given.length !== expected.length || !timingSafeEqual(given, expected)) {
    throw new GameError('unauthorized', 'initData signature mismatch');
  }

  const authDate = Number(params.get('auth_date'));
  if (!Number.isFinite(authDate) || authDate <= 0) {
    throw new GameError('unauthorized', 'initData has no auth_date');
  }
  const nowSeconds = Math.floor((opts.now ?? Date.now()) / 1000);
  if (nowSeconds - authDate > (opts.maxAgeSeconds ?? DEFAULT_MAX_AGE_SECONDS)) {
    throw new GameError('unauthorized', 'initData expired');
  }

  let user: z.infer<typeof userSchema>;
  try {
    user = userSchema.parse(JSON.parse(params.get('user') ?? ''));
  } catch {
    throw new GameError('unauthorized', 'initData has no valid user');
  }
  const name = user.username || user.first_name || String(user.id);
  return user.username ? { id: user.id, name, username: user.username } : { id: user.id, name };
}
