/**
 * Datos del upgrade HTTP relevantes para autenticar una conexión.
 */
export interface HandshakeRequest {
  token?: string;
  csrfToken?: string;
  csrfCookie?: string;
}

export interface AuthenticatedPrincipal {
  subject: string;
  roles: string[];
  jti: string;
}

export type HandshakeRejectionKind =
  | 'authentication'
  | 'authorization'
  | 'rate_limited'
  | 'internal';

/**
 * Motivo de rechazo: `reason` viaja al cliente en el close frame,
 * `detail` solo se registra en el servidor.
 */
export interface HandshakeRejection {
  readonly kind: HandshakeRejectionKind;
  readonly code: number;
  readonly reason: string;
  readonly detail: string;
}
