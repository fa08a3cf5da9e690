import { Injectable } from '@nestjs/common';
import { ClsService } from 'nestjs-cls';

import { AppClsStore, Actor } from './cls-store.interface';

/**
 * AsyncContextService: adapter tipado sobre ClsService<AppClsStore>.
 *
 * nestjs-cls propaga el contexto por todas las operaciones async de la request;
 * fuera de una request (gateway WebSocket, cron) los getters devuelven vacío.
 */
@Injectable()
export class AsyncContextService {
  constructor(private readonly cls: ClsService<AppClsStore>) {}

  /**
   * Establecer información del actor (solo dentro de un contexto activo)
   */
  setActor(actor: Actor): void {
    if (this.cls.isActive()) {
      this.cls.set('actor', actor);
    }
  }

  /**
   * Obtener el ID de la request actual, o undefined fuera de una request
   */
  getRequestId(): string | undefined {
    if (!this.cls.isActive()) {
      return undefined;
    }
    return this.cls.get('requestId') ?? this.cls.getId();
  }

  /**
   * Obtener el actor actual (usuario/servicio)
   */
  getActor(): Actor | undefined {
    return this.cls.isActive() ? this.cls.get('actor') : undefined;
  }

  getActorId(): string | undefined {
    return this.getActor()?.actorId;
  }
}
