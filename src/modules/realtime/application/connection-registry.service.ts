import { Injectable } from '@nestjs/common';

import { Connection, RegisterConnectionInput } from '../domain/models/connection.model';

/**
 * Registro de conexiones abiertas del proceso.
 *
 * Arena `connectionId → Connection` más un índice `subject → connectionIds`.
 * Todas las mutaciones son síncronas.
 */
@Injectable()
export class ConnectionRegistryService {
  private readonly connections = new Map<string, Connection>();
  private readonly bySubject = new Map<string, Set<string>>();

  /**
   * Añade una conexión. Un `connectionId` repetido es un error de programación.
   */
  register(input: RegisterConnectionInput): Connection {
    if (this.connections.has(input.connectionId)) {
      throw new Error(`Connection ${input.connectionId} is already registered`);
    }

    const now = Date.now();
    const connection: Connection = {
      connectionId: input.connectionId,
      subject: input.subject,
      roles: [...input.roles],
      jti: input.jti,
      connectedAt: new Date(now),
      lastActivity: now,
      subscribedChannels: new Set<string>(),
      state: input.state,
    };

    this.connections.set(connection.connectionId, connection);

    let ids = this.bySubject.get(connection.subject);
    if (!ids) {
      ids = new Set<string>();
      this.bySubject.set(connection.subject, ids);
    }
    ids.add(connection.connectionId);

    return connection;
  }

  get(connectionId: string): Connection | undefined {
    return this.connections.get(connectionId);
  }

  /**
   * Elimina la conexión de la arena y del índice. Idempotente.
   */
  remove(connectionId: string): Connection | undefined {
    const connection = this.connections.get(connectionId);
    if (!connection) {
      return undefined;
    }

    this.connections.delete(connectionId);

    const ids = this.bySubject.get(connection.subject);
    if (ids) {
      ids.delete(connectionId);
      if (ids.size === 0) {
        this.bySubject.delete(connection.subject);
      }
    }

    return connection;
  }

  listBySubject(subject: string): Connection[] {
    const ids = this.bySubject.get(subject) ?? new Set<string>();
    return [...ids]
      .map((id) => this.connections.get(id))
      .filter((connection): connection is Connection => connection !== undefined);
  }

  list(): Connection[] {
    return [...this.connections.values()];
  }

  count(): number {
    return this.connections.size;
  }

  subjectCount(): number {
    return this.bySubject.size;
  }
}
