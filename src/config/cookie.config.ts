import { CookieOptions } from 'express';

export const CSRF_COOKIE_NAME = 'csrftoken';

export interface CookieConfiguration {
  csrf_token: CookieOptions;
}

const SAME_SITE_VALUES = ['lax', 'none', 'strict'] as const;

type SameSite = (typeof SAME_SITE_VALUES)[number];

const isSameSite = (value: string | undefined): value is SameSite =>
  SAME_SITE_VALUES.some((candidate) => candidate === value);

export const getCookieConfig = (): CookieConfiguration => {
  const isProduction = process.env.NODE_ENV === 'production';
  const cookieDomain = process.env.COOKIE_DOMAIN;

  // En desarrollo local (localhost) no se fija domain para que funcione con varios puertos
  const configuredSameSite = process.env.COOKIE_SAME_SITE;
  const sameSite: SameSite = isSameSite(configuredSameSite)
    ? configuredSameSite
    : isProduction
      ? 'none'
      : 'lax';
  const secure = isProduction || process.env.COOKIE_SECURE === 'true';

  return {
    csrf_token: {
      secure,
      sameSite,
      ...(isProduction && cookieDomain ? { domain: cookieDomain } : {}),
      httpOnly: false, // Debe ser legible por JavaScript
      maxAge: 3600000, // 1 hora
      path: '/',
    },
  };
};
