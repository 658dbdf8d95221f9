import type { Request, Response, NextFunction } from 'express';
import crypto from 'crypto';

function sameSecret(a: string, b: string) {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  return left.length === right.length && crypto.timingSafeEqual(left, right);
}

/** Bearer-token check for the bot adapter; an empty key turns the check off. */
export function requireApiKey(apiKey: string) {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!apiKey) return next();
    const bearer = req.headers.authorization?.toString();
    const token = bearer && bearer.startsWith('Bearer ') ? bearer.substring(7) : undefined;
    if (!token) return res.status(401).json({ message: 'Missing bearer token', code: 'unauthorized' });
    if (!sameSecret(token, apiKey)) return res.status(401).json({ message: 'Invalid API key', code: 'unauthorized' });
    next();
  };
}
