export type PubSubListener = (message: string, channel: string) => void;

/**
 * Suscripción activa a un canal. `unsubscribe` es idempotente.
 */
export interface PubSubSubscription {
  readonly channel: string;
  unsubscribe(): Promise<void>;
}

/**
 * Puerto de publicación/suscripción distribuida usado para el fan-out
 * del gateway realtime (Redis en producción, EventBus en memoria).
 */
export interface IPubSubPort {
  /**
   * Publica un mensaje y devuelve el número de receptores alcanzados.
   */
  publish(channel: string, message: string): Promise<number>;

  subscribe(channel: string, listener: PubSubListener): Promise<PubSubSubscription>;
}
