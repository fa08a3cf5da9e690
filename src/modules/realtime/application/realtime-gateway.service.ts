import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { v4 as uuidv4 } from 'uuid';

import { INJECTION_TOKENS } from '../../../common/constants/injection-tokens';
import type { IMetricsSink } from '../../../common/interfaces/metrics-sink.interface';
import type { IPubSubPort } from '../../../common/interfaces/pubsub.interface';
import { Result } from '../../../common/types/result.type';
import { EventBusService } from '../../event-bus/application/event-bus.service';
import { Connection, ConnectionLifecycleEvent } from '../domain/models/connection.model';
import {
  AuthenticatedPrincipal,
  HandshakeRejection,
  HandshakeRequest,
} from '../domain/models/handshake.model';
import { CLOSE_CODES, GATEWAY_CONNECTIONS_TOPIC } from '../domain/models/realtime-channels';
import type { IRealtimeSocket } from '../domain/ports/realtime-socket.port';
import { ConnectionLifecycle } from './connection-lifecycle';
import { ConnectionRegistryService } from './connection-registry.service';
import { ConnectionSession, ConnectionSessionOptions } from './connection-session';
import { HandshakeAuthenticator } from './handshake-authenticator.service';
import { RealtimeMessageRouter } from './realtime-message.router';

const DEFAULT_RECEIVE_TIMEOUT_MS = 100;
const DEFAULT_LIVENESS_MS = 30_000;
const DEFAULT_FANOUT_QUEUE_SIZE = 1000;

/**
 * Orquesta el ciclo de vida completo de una conexión WebSocket:
 * handshake, registro, sesión y liberación.
 *
 * `serve` no resuelve hasta que la conexión termina. Todos los caminos de
 * salida pasan por `release`.
 */
@Injectable()
export class RealtimeGatewayService {
  private readonly logger = new Logger(RealtimeGatewayService.name);
  private readonly options: ConnectionSessionOptions;

  constructor(
    private readonly authenticator: HandshakeAuthenticator,
    private readonly registry: ConnectionRegistryService,
    private readonly router: RealtimeMessageRouter,
    private readonly eventBus: EventBusService,
    @Inject(INJECTION_TOKENS.PUBSUB) private readonly pubsub: IPubSubPort,
    @Inject(INJECTION_TOKENS.METRICS_SINK) private readonly metrics: IMetricsSink,
    private readonly configService: ConfigService,
  ) {
    this.options = {
      receiveTimeoutMs: this.positive('WS_RECEIVE_TIMEOUT_MS', DEFAULT_RECEIVE_TIMEOUT_MS),
      livenessMs: this.positive('WS_LIVENESS_MS', DEFAULT_LIVENESS_MS),
      fanoutQueueSize: Math.floor(this.positive('WS_FANOUT_QUEUE_SIZE', DEFAULT_FANOUT_QUEUE_SIZE)),
    };
  }

  get sessionOptions(): ConnectionSessionOptions {
    return { ...this.options };
  }

  async serve(socket: IRealtimeSocket, handshake: HandshakeRequest): Promise<void> {
    const connectionId = uuidv4();
    const lifecycle = new ConnectionLifecycle(connectionId);

    if (handshake.token) {
      lifecycle.send({ type: 'TOKEN_PRESENTED' });
    }

    const authenticated = await this.authenticate(handshake);
    if (authenticated.isFailure) {
      await this.reject(connectionId, lifecycle, socket, authenticated.getError());
      return;
    }

    const principal = authenticated.getValue();
    lifecycle.send({ type: 'AUTHENTICATED', subject: principal.subject });

    const connection = this.registry.register({
      connectionId,
      subject: principal.subject,
      roles: principal.roles,
      jti: principal.jti,
      state: lifecycle.state,
    });
    const session = new ConnectionSession(
      connection,
      lifecycle,
      socket,
      this.pubsub,
      this.router,
      this.options,
    );

    try {
      await session.subscribeInitial();
    } catch (error) {
      const errorMsg = error instanceof Error ? error.message : String(error);
      this.logger.error(`Subscription setup failed for ${connectionId}: ${errorMsg}`);
      session.close(CLOSE_CODES.INTERNAL_ERROR, 'Internal error: subscription failed');
    }

    try {
      if (lifecycle.state === 'subscribed') {
        this.logger.log(`Connection ${connectionId} opened for ${connection.subject}`);
        this.metrics.increment('gateway.connections_opened');
        await this.publishLifecycle({
          event: 'connection.opened',
          connectionId,
          subject: connection.subject,
        });

        await session.run();
      }
    } finally {
      await this.release(connection, lifecycle, session);
    }
  }

  private async authenticate(
    handshake: HandshakeRequest,
  ): Promise<Result<AuthenticatedPrincipal, HandshakeRejection>> {
    try {
      return await this.authenticator.authenticate(handshake);
    } catch (error) {
      const errorMsg = error instanceof Error ? error.message : String(error);
      return Result.fail<AuthenticatedPrincipal, HandshakeRejection>({
        kind: 'internal',
        code: CLOSE_CODES.INTERNAL_ERROR,
        reason: 'Internal error: handshake failed',
        detail: errorMsg,
      });
    }
  }

  private async reject(
    connectionId: string,
    lifecycle: ConnectionLifecycle,
    socket: IRealtimeSocket,
    rejection: HandshakeRejection,
  ): Promise<void> {
    lifecycle.send({ type: 'REJECT', code: rejection.code, reason: rejection.reason });
    socket.close(rejection.code, rejection.reason);
    lifecycle.stop();

    this.logger.warn(
      `Connection ${connectionId} rejected (${rejection.kind}, close ${rejection.code}): ${rejection.detail}`,
    );
    this.metrics.increment('gateway.connections_rejected', 1, { kind: rejection.kind });

    await this.publishLifecycle({
      event: 'connection.rejected',
      connectionId,
      code: rejection.code,
      reason: rejection.reason,
    });
  }

  private async release(
    connection: Connection,
    lifecycle: ConnectionLifecycle,
    session: ConnectionSession,
  ): Promise<void> {
    if (lifecycle.state === 'subscribed' || lifecycle.state === 'active') {
      session.close(CLOSE_CODES.INTERNAL_ERROR, 'Internal error');
    }

    await session.teardown();
    this.registry.remove(connection.connectionId);

    lifecycle.send({ type: 'CLOSED' });
    connection.state = lifecycle.state;
    lifecycle.stop();

    const details = session.closeDetails;
    this.logger.log(
      `Connection ${connection.connectionId} closed (${details.initiatedBy}, ${details.code}: ${details.reason})`,
    );
    this.metrics.increment('gateway.connections_closed', 1, { initiatedBy: details.initiatedBy });
    if (session.droppedFrames > 0) {
      this.metrics.increment('gateway.fanout_dropped', session.droppedFrames);
    }

    await this.publishLifecycle({
      event: 'connection.closed',
      connectionId: connection.connectionId,
      subject: connection.subject,
      code: details.code,
      reason: details.reason,
    });
  }

  private async publishLifecycle(event: ConnectionLifecycleEvent): Promise<void> {
    await this.eventBus.publish(GATEWAY_CONNECTIONS_TOPIC, event);
  }

  private positive(key: string, fallback: number): number {
    const value = Number(this.configService.get<number>(key) ?? fallback);
    return Number.isFinite(value) && value > 0 ? value : fallback;
  }
}
