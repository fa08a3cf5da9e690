import type { IncomingMessage } from 'http';

import { parse as parseCookies } from 'cookie';

import { CSRF_COOKIE_NAME } from '../../../../config/cookie.config';
import { HandshakeRequest } from '../../domain/models/handshake.model';

export type UpgradeRequest = Pick<IncomingMessage, 'url' | 'headers'>;

const BEARER_PREFIX = 'Bearer ';

/**
 * Extrae token y CSRF de la petición de upgrade.
 * El token de la query tiene prioridad sobre la cabecera Authorization.
 */
export function parseHandshake(request: UpgradeRequest): HandshakeRequest {
  const url = new URL(request.url ?? '/', 'http://localhost');

  const authorization = request.headers.authorization;
  const headerToken = authorization?.startsWith(BEARER_PREFIX)
    ? authorization.slice(BEARER_PREFIX.length).trim()
    : authorization?.trim();

  const cookies = parseCookies(request.headers.cookie ?? '');

  return {
    token: url.searchParams.get('token') || headerToken || undefined,
    csrfToken: url.searchParams.get('csrf_token') ?? undefined,
    csrfCookie: cookies[CSRF_COOKIE_NAME],
  };
}
