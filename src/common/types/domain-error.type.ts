/**
 * Taxonomía de errores compartida por los módulos.
 *
 * - authentication: token ausente, inválido, expirado o revocado (401 / close 1008)
 * - authorization: actor autenticado sin el rol requerido (403 / close 4401)
 * - rate_limited: ventana de rate limit agotada (429)
 * - not_found: recurso desconocido (404)
 * - transient_infra: cache o log durable inalcanzable
 * - internal: fallo inesperado (500 / close 1011)
 */
export type DomainErrorKind =
  | 'authentication'
  | 'authorization'
  | 'rate_limited'
  | 'not_found'
  | 'transient_infra'
  | 'internal';

export interface DomainError<K extends string = DomainErrorKind> {
  readonly kind: K;
  readonly message: string;
}

export type AuthorizationError = DomainError<'authorization'>;

export type NotFoundError = DomainError<'not_found'>;

export function domainError<K extends string>(
  kind: K,
  message: string,
): DomainError<K> {
  return { kind, message };
}
