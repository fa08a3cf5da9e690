import { randomUUID } from 'crypto';

/**
 * Abstract base class for all domain events emitted through EventEmitter2.
 * Provides versioning, timestamping, and request tracing.
 */
export abstract class BaseDomainEvent {
  /**
   * Nombre con el que se emite el evento
   */
  abstract readonly eventName: string;

  /**
   * Event schema version for versioning support
   */
  public readonly version: number = 1;

  public readonly occurredAt: Date;

  public readonly eventId: string;

  /**
   * Request ID for tracing (from nestjs-cls)
   */
  public readonly requestId?: string;

  constructor(requestId?: string) {
    this.occurredAt = new Date();
    this.eventId = randomUUID();
    this.requestId = requestId;
  }
}
