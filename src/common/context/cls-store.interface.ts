import { ClsStore } from 'nestjs-cls';

import type { Actor } from '../interfaces/actor.interface';

export type { Actor };

/**
 * App Cls Store: interfaz tipada para el contexto de nestjs-cls.
 * Proporciona type-safety al trabajar con ClsService<AppClsStore>.
 */
export interface AppClsStore extends ClsStore {
  // Identificador único de la request
  requestId?: string;

  // Actor autenticado (extraído del JWT)
  actor?: Actor;
}
