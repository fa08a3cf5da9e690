import { Logger } from '@nestjs/common';

import type { IPubSubPort, PubSubSubscription } from '../../../common/interfaces/pubsub.interface';
import { BoundedQueue } from '../../../common/queues/bounded-queue';
import { Connection } from '../domain/models/connection.model';
import { CLOSE_CODES, groupChannel, roleChannel, userChannel } from '../domain/models/realtime-channels';
import { ControlFrame, RouteAction, frames, parseControlFrame } from '../domain/models/realtime-message.model';
import type { IRealtimeSocket } from '../domain/ports/realtime-socket.port';
import { ConnectionEvent } from '../domain/state-machines/connection.state-machine';
import { ConnectionLifecycle } from './connection-lifecycle';
import { RealtimeMessageRouter } from './realtime-message.router';

export interface ConnectionSessionOptions {
  /** Espera máxima por mensaje del cliente en cada vuelta del bucle */
  receiveTimeoutMs: number;
  /** Inactividad tras la que se envía un ping */
  livenessMs: number;
  /** Capacidad de la cola de fan-out (drop-oldest) */
  fanoutQueueSize: number;
}

export interface SessionCloseInfo {
  code: number;
  reason: string;
  initiatedBy: 'client' | 'server';
}

const CLIENT_DISCONNECTED = 'Client disconnected';

/**
 * Sesión de una conexión autenticada: suscripciones pub/sub, bucle
 * principal y liberación de recursos.
 *
 * Cada vuelta del bucle:
 * 1. aplica tramas de control pendientes (revocación del jti propio)
 * 2. reenvía como mucho una trama de fan-out
 * 3. espera un mensaje del cliente con timeout corto y lo enruta
 * 4. envía un ping si el cliente lleva `livenessMs` inactivo
 */
export class ConnectionSession {
  private readonly logger = new Logger(ConnectionSession.name);

  private readonly fanout: BoundedQueue<string>;
  private readonly controls: ControlFrame[] = [];
  private readonly subscriptions = new Map<string, PubSubSubscription>();

  private closeInfo: SessionCloseInfo = {
    code: CLOSE_CODES.NORMAL,
    reason: CLIENT_DISCONNECTED,
    initiatedBy: 'client',
  };

  constructor(
    private readonly connection: Connection,
    private readonly lifecycle: ConnectionLifecycle,
    private readonly socket: IRealtimeSocket,
    private readonly pubsub: IPubSubPort,
    private readonly router: RealtimeMessageRouter,
    private readonly options: ConnectionSessionOptions,
  ) {
    this.fanout = new BoundedQueue<string>(options.fanoutQueueSize);
  }

  get closeDetails(): SessionCloseInfo {
    return { ...this.closeInfo };
  }

  get droppedFrames(): number {
    return this.fanout.dropped;
  }

  /**
   * Suscribe el canal del subject y un canal por rol.
   */
  async subscribeInitial(): Promise<void> {
    await this.subscribe(userChannel(this.connection.subject));
    for (const role of this.connection.roles) {
      await this.subscribe(roleChannel(role));
    }
  }

  async run(): Promise<SessionCloseInfo> {
    if (!this.transition({ type: 'START' })) {
      return this.closeDetails;
    }

    try {
      while (this.lifecycle.state === 'active') {
        await this.tick();
      }
    } catch (error) {
      const errorMsg = error instanceof Error ? error.message : String(error);
      this.logger.error(`Connection ${this.connection.connectionId} failed: ${errorMsg}`);
      this.close(CLOSE_CODES.INTERNAL_ERROR, 'Internal error');
    }

    return this.closeDetails;
  }

  /**
   * Cierre iniciado por el servidor. Solo tiene efecto la primera vez.
   */
  close(code: number, reason: string): void {
    if (!this.transition({ type: 'CLOSE', code, reason })) {
      return;
    }
    this.closeInfo = { code, reason, initiatedBy: 'server' };
    this.socket.close(code, reason);
  }

  /**
   * Cancela todas las suscripciones y cierra la cola de fan-out. Idempotente.
   */
  async teardown(): Promise<void> {
    this.fanout.close();
    this.controls.length = 0;

    const subscriptions = [...this.subscriptions.values()];
    this.subscriptions.clear();
    this.connection.subscribedChannels.clear();

    await Promise.all(
      subscriptions.map(async (subscription) => {
        try {
          await subscription.unsubscribe();
        } catch (error) {
          const errorMsg = error instanceof Error ? error.message : String(error);
          this.logger.warn(`Failed to unsubscribe ${subscription.channel}: ${errorMsg}`);
        }
      }),
    );
  }

  private async tick(): Promise<void> {
    if (this.applyControls()) {
      return;
    }

    const frame = this.fanout.tryShift();
    if (frame !== undefined && !(await this.deliver(frame))) {
      return;
    }

    const received = await this.socket.receive(this.options.receiveTimeoutMs);
    if (received.kind === 'closed') {
      this.markClientClosed();
      return;
    }

    if (received.kind === 'message') {
      this.connection.lastActivity = Date.now();
      await this.handleMessage(received.data);
    }

    if (this.lifecycle.state === 'active') {
      await this.checkLiveness();
    }
  }

  private readonly onPublished = (message: string): void => {
    const control = parseControlFrame(message);
    if (control) {
      this.controls.push(control);
      return;
    }

    if (!this.fanout.push(message) && !this.fanout.isClosed) {
      this.logger.warn(
        `Fan-out queue full for connection ${this.connection.connectionId}, oldest frame dropped`,
      );
    }
  };

  private applyControls(): boolean {
    for (const control of this.controls.splice(0)) {
      if (control.action === 'revoke' && control.jti === this.connection.jti) {
        this.logger.log(`Closing connection ${this.connection.connectionId}: token ${control.jti} revoked`);
        this.close(CLOSE_CODES.POLICY_VIOLATION, 'Token revoked');
        return true;
      }
    }
    return false;
  }

  private async handleMessage(raw: string): Promise<void> {
    try {
      const action = await this.router.route(raw, this.connection.subject);
      await this.execute(action);
    } catch (error) {
      const errorMsg = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Message from ${this.connection.connectionId} failed: ${errorMsg}`);
      await this.deliver(frames.error(errorMsg));
    }
  }

  private async execute(action: RouteAction): Promise<void> {
    switch (action.kind) {
      case 'reply':
        await this.deliver(action.frame);
        return;
      case 'join':
        await this.subscribe(groupChannel(action.channelId));
        await this.deliver(frames.channelJoined(action.channelId));
        return;
      case 'leave':
        await this.unsubscribe(groupChannel(action.channelId));
        return;
    }
  }

  private async checkLiveness(): Promise<void> {
    const now = Date.now();
    if (now - this.connection.lastActivity < this.options.livenessMs) {
      return;
    }

    if (await this.deliver(frames.ping(now))) {
      this.connection.lastActivity = now;
    }
  }

  /**
   * Envía una trama; si el envío falla la conexión pasa a closing.
   */
  private async deliver(frame: string): Promise<boolean> {
    try {
      await this.socket.send(frame);
      return true;
    } catch (error) {
      const errorMsg = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Send to ${this.connection.connectionId} failed: ${errorMsg}`);

      if (this.socket.isOpen) {
        this.close(CLOSE_CODES.INTERNAL_ERROR, 'Send failed');
      } else {
        this.markClientClosed();
      }
      return false;
    }
  }

  private async subscribe(channel: string): Promise<void> {
    if (this.subscriptions.has(channel)) {
      return;
    }

    const subscription = await this.pubsub.subscribe(channel, this.onPublished);
    if (this.fanout.isClosed) {
      await subscription.unsubscribe();
      return;
    }

    this.subscriptions.set(channel, subscription);
    this.connection.subscribedChannels.add(channel);
  }

  private async unsubscribe(channel: string): Promise<void> {
    const subscription = this.subscriptions.get(channel);
    if (!subscription) {
      return;
    }

    this.subscriptions.delete(channel);
    this.connection.subscribedChannels.delete(channel);
    await subscription.unsubscribe();
  }

  private markClientClosed(): void {
    if (this.transition({ type: 'CLOSE', code: CLOSE_CODES.NORMAL, reason: CLIENT_DISCONNECTED })) {
      this.closeInfo = { code: CLOSE_CODES.NORMAL, reason: CLIENT_DISCONNECTED, initiatedBy: 'client' };
    }
  }

  private transition(event: ConnectionEvent): boolean {
    const accepted = this.lifecycle.send(event);
    this.connection.state = this.lifecycle.state;
    return accepted;
  }
}
