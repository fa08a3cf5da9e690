/**
 * Mensaje publicado en un tópico del EventBus. Inmutable una vez publicado.
 */
export interface EventMessage<T = unknown> {
  readonly id: string;
  readonly topic: string;
  /** Epoch en milisegundos */
  readonly timestamp: number;
  readonly payload: T;
}

export type EventHandler = (message: EventMessage) => void | Promise<void>;

export interface PublishOptions {
  id?: string;
  timestamp?: number;
}

export const DEFAULT_HISTORY_SIZE = 100;

export const DEFAULT_CHANNEL_CAPACITY = 100;
