import { Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';

import { Result } from '../../../common/types/result.type';
import { NotFoundError, domainError } from '../../../common/types/domain-error.type';
import {
  DEFAULT_ENDPOINT_CATEGORY,
  ENDPOINT_HISTORY_LIMIT,
  EndpointInfo,
  EndpointMetadata,
  EndpointStatus,
  EndpointStatusSummary,
  RegisterEndpointOptions,
} from '../domain/models/endpoint.model';
import {
  ENDPOINT_EVENTS,
  EndpointStatusChangedEvent,
} from '../domain/events/endpoint-status-changed.event';

const snapshot = (info: EndpointInfo): EndpointInfo => ({
  ...info,
  lastChecked: new Date(info.lastChecked.getTime()),
  metadata: { ...info.metadata },
  tags: [...info.tags],
  history: info.history.map((transition) => ({
    ...transition,
    timestamp: new Date(transition.timestamp.getTime()),
    metadata: { ...transition.metadata },
  })),
});

/**
 * Catálogo de endpoints con su estado de salud.
 *
 * Una instancia por contenedor. Las lecturas devuelven copias; el historial
 * crece solo con transiciones reales y se recorta a ENDPOINT_HISTORY_LIMIT.
 */
@Injectable()
export class EndpointHealthRegistry {
  private readonly logger = new Logger(EndpointHealthRegistry.name);
  private readonly endpoints = new Map<string, EndpointInfo>();

  constructor(private readonly eventEmitter: EventEmitter2) {}

  /**
   * Crea el endpoint o fusiona con el existente: el nombre se sobrescribe,
   * descripción y categoría solo si se indican, metadata se fusiona y los
   * tags se unen. El estado de un endpoint existente no cambia.
   */
  register(endpointId: string, name: string, options: RegisterEndpointOptions = {}): EndpointInfo {
    const existing = this.endpoints.get(endpointId);

    if (existing) {
      existing.name = name;
      if (options.description !== undefined) {
        existing.description = options.description;
      }
      if (options.category !== undefined) {
        existing.category = options.category;
      }
      existing.metadata = { ...existing.metadata, ...options.metadata };
      existing.tags = [...new Set([...existing.tags, ...(options.tags ?? [])])];
      return snapshot(existing);
    }

    const info: EndpointInfo = {
      endpointId,
      name,
      description: options.description ?? '',
      category: options.category ?? DEFAULT_ENDPOINT_CATEGORY,
      status: options.status ?? EndpointStatus.STARTING,
      lastChecked: new Date(),
      metadata: { ...options.metadata },
      tags: [...new Set(options.tags ?? [])],
      history: [],
    };
    this.endpoints.set(endpointId, info);
    this.logger.debug(`Endpoint registered: ${endpointId} (${info.status})`);

    return snapshot(info);
  }

  /**
   * Cambia el estado. Con el mismo estado solo refresca `lastChecked`.
   * La transición guarda la metadata del endpoint previa a la fusión.
   */
  updateStatus(
    endpointId: string,
    status: EndpointStatus,
    metadata?: EndpointMetadata,
  ): Result<EndpointInfo, NotFoundError> {
    const info = this.endpoints.get(endpointId);
    if (!info) {
      return Result.fail<EndpointInfo, NotFoundError>(
        domainError('not_found', `Endpoint ${endpointId} not found`),
      );
    }

    const now = new Date();
    if (info.status === status) {
      info.lastChecked = now;
      return Result.ok<EndpointInfo, NotFoundError>(snapshot(info));
    }

    const previousStatus = info.status;
    info.history.push({
      previousStatus,
      newStatus: status,
      timestamp: now,
      metadata: { ...info.metadata },
    });
    if (info.history.length > ENDPOINT_HISTORY_LIMIT) {
      info.history.splice(0, info.history.length - ENDPOINT_HISTORY_LIMIT);
    }

    info.status = status;
    info.lastChecked = now;
    info.metadata = { ...info.metadata, ...metadata };

    this.logger.log(`Endpoint ${endpointId}: ${previousStatus} → ${status}`);
    this.eventEmitter.emit(
      ENDPOINT_EVENTS.STATUS_CHANGED,
      new EndpointStatusChangedEvent(endpointId, previousStatus, status, { ...metadata }),
    );

    return Result.ok<EndpointInfo, NotFoundError>(snapshot(info));
  }

  get(endpointId: string): EndpointInfo | undefined {
    const info = this.endpoints.get(endpointId);
    return info ? snapshot(info) : undefined;
  }

  has(endpointId: string): boolean {
    return this.endpoints.has(endpointId);
  }

  list(): EndpointInfo[] {
    return [...this.endpoints.values()].map(snapshot);
  }

  listByStatus(status: EndpointStatus | EndpointStatus[]): EndpointInfo[] {
    const wanted = Array.isArray(status) ? status : [status];
    return this.list().filter((info) => wanted.includes(info.status));
  }

  listByCategory(category: string): EndpointInfo[] {
    return this.list().filter((info) => info.category === category);
  }

  listByTag(tag: string): EndpointInfo[] {
    return this.list().filter((info) => info.tags.includes(tag));
  }

  /**
   * Número de endpoints por estado; todos los estados aparecen.
   */
  summary(): EndpointStatusSummary {
    const summary: EndpointStatusSummary = {
      [EndpointStatus.HEALTHY]: 0,
      [EndpointStatus.DEGRADED]: 0,
      [EndpointStatus.DOWN]: 0,
      [EndpointStatus.UNKNOWN]: 0,
      [EndpointStatus.STARTING]: 0,
      [EndpointStatus.MAINTENANCE]: 0,
      [EndpointStatus.PLANNED]: 0,
    };

    for (const info of this.endpoints.values()) {
      summary[info.status]++;
    }
    return summary;
  }

  /**
   * Pasa todos los endpoints en `from` a `to`.
   * @returns cuántos endpoints cambiaron
   */
  promote(from: EndpointStatus, to: EndpointStatus): number {
    const ids = [...this.endpoints.values()]
      .filter((info) => info.status === from)
      .map((info) => info.endpointId);

    for (const id of ids) {
      this.updateStatus(id, to);
    }
    return ids.length;
  }
}
