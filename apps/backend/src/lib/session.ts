import type { Response } from 'express';

export interface SessionCookieConfig {
  cookieName: string;
  ttlSeconds: number;
  secure: boolean;
}

export function setSessionCookie(res: Response, config: SessionCookieConfig, token: string): void {
  res.cookie(config.cookieName, token, {
    httpOnly: true,
    sameSite: 'lax',
    secure: config.secure,
    maxAge: config.ttlSeconds * 1000,
    path: '/',
  });
}

export function clearSessionCookie(res: Response, config: SessionCookieConfig): void {
  res.clearCookie(config.cookieName, {
    httpOnly: true,
    sameSite: 'lax',
    secure: config.secure,
    path: '/',
  });
}
