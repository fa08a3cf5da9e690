import { ConnectionState } from '../state-machines/connection.state-machine';

/**
 * Conexión registrada en el gateway. Propiedad exclusiva del registro;
 * varias conexiones por subject conviven sin sobrescribirse.
 */
export interface Connection {
  readonly connectionId: string;
  readonly subject: string;
  readonly roles: string[];
  readonly jti: string;
  readonly connectedAt: Date;
  /** Epoch en milisegundos de la última actividad del cliente */
  lastActivity: number;
  readonly subscribedChannels: Set<string>;
  state: ConnectionState;
}

export interface RegisterConnectionInput {
  connectionId: string;
  subject: string;
  roles: string[];
  jti: string;
  state: ConnectionState;
}

export interface ConnectionLifecycleEvent {
  event: 'connection.opened' | 'connection.closed' | 'connection.rejected';
  connectionId: string;
  subject?: string;
  code?: number;
  reason?: string;
}
