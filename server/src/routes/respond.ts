import type { Response } from 'express';
import { ZodError } from 'zod';
import { HTTP_STATUS, isGameError } from '../lib/errors';

export function sendError(res: Response, err: unknown, tag: string) {
  if (err instanceof ZodError) {
    return res.status(400).json({ error: 'invalid_input', details: err.issues });
  }
  if (isGameError(err)) {
    if (!err.clientFacing) console.error(`[${tag}] ${err.code}:`, err.message);
    return res.status(HTTP_STATUS[err.code]).json({ error: err.code, message: err.message });
  }
  console.error(`[${tag}] error`, err);
  return res.status(500).json({ error: `${tag}_error` });
}
