import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { v4 as uuidv4 } from 'uuid';

import { BoundedQueue } from '../../../common/queues/bounded-queue';
import {
  DEFAULT_CHANNEL_CAPACITY,
  DEFAULT_HISTORY_SIZE,
  EventHandler,
  EventMessage,
  PublishOptions,
} from '../domain/models/event-message.model';
import { EventChannel } from './event-channel';

/**
 * EventBus en proceso: pub/sub por tópico con historial acotado.
 *
 * - Historial FIFO por tópico (capacidad EVENT_BUS_HISTORY_SIZE)
 * - Un error de un suscriptor se registra y nunca corta la entrega al resto
 * - Orden de publicación garantizado dentro de un tópico, no entre tópicos
 *
 * Los mapas se mutan solo en secciones síncronas.
 */
@Injectable()
export class EventBusService {
  private readonly logger = new Logger(EventBusService.name);

  private readonly subscribers = new Map<string, Set<EventHandler>>();
  private readonly history = new Map<string, EventMessage[]>();
  private readonly historySize: number;

  constructor(private readonly configService: ConfigService) {
    const configured =
      this.configService.get<number>('EVENT_BUS_HISTORY_SIZE') ?? DEFAULT_HISTORY_SIZE;
    this.historySize = Math.max(1, Math.floor(Number(configured)));
  }

  /**
   * Publica un mensaje: lo añade al historial y lo entrega a cada suscriptor actual.
   */
  async publish<T>(
    topic: string,
    payload: T,
    options: PublishOptions = {},
  ): Promise<EventMessage<T>> {
    const message: EventMessage<T> = Object.freeze({
      id: options.id ?? uuidv4(),
      topic,
      timestamp: options.timestamp ?? Date.now(),
      payload,
    });

    this.append(message);

    // Copia: un handler puede desuscribirse durante la entrega
    const handlers = [...(this.subscribers.get(topic) ?? [])];

    for (const handler of handlers) {
      try {
        await handler(message);
      } catch (error) {
        const errorMsg = error instanceof Error ? error.message : String(error);
        this.logger.error(
          `Subscriber failed for topic ${topic} (message ${message.id}): ${errorMsg}`,
        );
      }
    }

    return message;
  }

  subscribe(topic: string, handler: EventHandler): void {
    let handlers = this.subscribers.get(topic);
    if (!handlers) {
      handlers = new Set<EventHandler>();
      this.subscribers.set(topic, handlers);
    }
    handlers.add(handler);
    this.logger.debug(`Subscribed to ${topic} (${handlers.size} subscribers)`);
  }

  unsubscribe(topic: string, handler: EventHandler): boolean {
    const handlers = this.subscribers.get(topic);
    if (!handlers || !handlers.delete(handler)) {
      return false;
    }

    if (handlers.size === 0) {
      this.subscribers.delete(topic);
    }
    return true;
  }

  subscriberCount(topic: string): number {
    return this.subscribers.get(topic)?.size ?? 0;
  }

  /**
   * Abre un canal acotado sobre el tópico. Cerrar el canal lo desuscribe.
   */
  openChannel(topic: string, capacity: number = DEFAULT_CHANNEL_CAPACITY): EventChannel {
    const queue = new BoundedQueue<EventMessage>(capacity);
    const handler: EventHandler = (message) => {
      if (!queue.push(message) && !queue.isClosed) {
        this.logger.warn(`Channel on ${topic} is full, oldest message dropped`);
      }
    };

    this.subscribe(topic, handler);
    return new EventChannel(topic, queue, () => {
      this.unsubscribe(topic, handler);
    });
  }

  /**
   * Historial del tópico, completo o solo los mensajes con timestamp
   * estrictamente posterior a `since`, en orden de publicación.
   */
  poll(topic: string, since?: number): EventMessage[] {
    const entries = this.history.get(topic) ?? [];
    if (since === undefined) {
      return [...entries];
    }
    return entries.filter((message) => message.timestamp > since);
  }

  clearHistory(topic?: string): void {
    if (topic === undefined) {
      this.history.clear();
      return;
    }
    this.history.delete(topic);
  }

  topics(): string[] {
    return [...new Set([...this.history.keys(), ...this.subscribers.keys()])].sort();
  }

  private append(message: EventMessage): void {
    let entries = this.history.get(message.topic);
    if (!entries) {
      entries = [];
      this.history.set(message.topic, entries);
    }

    entries.push(message);
    if (entries.length > this.historySize) {
      entries.splice(0, entries.length - this.historySize);
    }
  }
}
