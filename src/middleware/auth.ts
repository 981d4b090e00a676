import { timingSafeEqual } from 'node:crypto';
import { Request, Response, NextFunction } from 'express';

export const HOST_TOKEN_HEADER = 'x-host-token';

function tokensMatch(given: string, expected: string): boolean {
  const a = Buffer.from(given);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Only the host plugin holding HOST_BRIDGE_TOKEN may talk to the shim.
 */
export const validateHostToken = (req: Request, res: Response, next: NextFunction): void => {
  const token = req.headers[HOST_TOKEN_HEADER];
  const expectedToken = process.env.HOST_BRIDGE_TOKEN;

  if (!expectedToken) {
    console.error('[Auth] HOST_BRIDGE_TOKEN not configured in environment variables');
    res.status(500).json({ error: 'Shim configuration error' });
    return;
  }

  if (typeof token !== 'string' || token === '') {
    res.status(401).json({ error: 'Missing X-Host-Token header' });
    return;
  }

  if (!tokensMatch(token, expectedToken)) {
    res.status(403).json({ error: 'Invalid host token' });
    return;
  }

  next();
};
