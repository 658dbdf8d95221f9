import cors, { type CorsOptions } from 'cors';
import { ENV } from './env.js';

// Allowlist via env CORS_ORIGINS, comma-separated; local dashboards are always allowed
const defaultOrigins = 'http://localhost:3000,http://localhost:5173';

export function parseOrigins(raw: string): string[] {
  return (raw ? `${raw},${defaultOrigins}` : defaultOrigins)
    .split(',')
    .map(s => s.trim())
    .filter(Boolean)
    // de-duplicate while preserving order
    .filter((v, i, a) => a.indexOf(v) === i);
}

// Exact matches and simple wildcard patterns like https://*.example.org
export function isOriginAllowed(origin: string, allowedOrigins: string[]): boolean {
  if (!origin) return true;
  if (allowedOrigins.includes('*')) return true;
  if (allowedOrigins.includes(origin)) return true;
  for (const pat of allowedOrigins) {
    if (!pat.includes('*')) continue;
    // Escape regex special chars except '*', then replace '*' with '.*'
    const regex = new RegExp('^' + pat.replace(/[.+?^${}()|[\]\\]/g, '\\$&').replace(/\*/g, '.*') + '$');
    if (regex.test(origin)) return true;
  }
  return false;
}

export function createCorsMiddleware(raw: string = ENV.CORS_ORIGINS) {
  const allowedOrigins = parseOrigins(raw);
  const options: CorsOptions = {
    origin: (origin, callback) => {
      // Non-browser callers (the bot adapter) send no Origin header
      if (!origin || isOriginAllowed(origin, allowedOrigins)) return callback(null, true);
      return callback(null, false);
    },
    methods: ['GET', 'HEAD', 'POST', 'OPTIONS'],
    exposedHeaders: ['Content-Length'],
    maxAge: 600,
    optionsSuccessStatus: 204,
  };
  return cors(options);
}
