/**
 * Nombres de canales pub/sub y tópicos del gateway realtime.
 */
export const userChannel = (subject: string): string => `user:${subject}:realtime`;

export const roleChannel = (role: string): string => `role:${role}:broadcasts`;

export const groupChannel = (channelId: string): string => `channel:${channelId}`;

/** Tópico del EventBus con los eventos de ciclo de vida de conexiones */
export const GATEWAY_CONNECTIONS_TOPIC = 'gateway.connections';

export const CLOSE_CODES = {
  NORMAL: 1000,
  POLICY_VIOLATION: 1008,
  INTERNAL_ERROR: 1011,
  CSRF_REJECTED: 4401,
} as const;
