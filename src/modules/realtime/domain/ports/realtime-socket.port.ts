export type SocketReceiveResult =
  | { kind: 'message'; data: string }
  | { kind: 'timeout' }
  | { kind: 'closed' };

/**
 * Socket de una conexión realtime visto desde la sesión.
 */
export interface IRealtimeSocket {
  readonly isOpen: boolean;

  /**
   * Espera el siguiente mensaje de texto como máximo `timeoutMs`.
   */
  receive(timeoutMs: number): Promise<SocketReceiveResult>;

  send(data: string): Promise<void>;

  close(code: number, reason: string): void;
}
