import { type Actor as MachineActor, createActor } from 'xstate';

import {
  ConnectionEvent,
  ConnectionState,
  connectionStateMachine,
  isConnectionState,
} from '../domain/state-machines/connection.state-machine';

/**
 * Actor xstate de una conexión. Los eventos no permitidos en el estado
 * actual se ignoran y `send` devuelve false.
 */
export class ConnectionLifecycle {
  private readonly actor: MachineActor<typeof connectionStateMachine>;

  constructor(readonly connectionId: string) {
    this.actor = createActor(connectionStateMachine, { input: { connectionId } });
    this.actor.start();
  }

  get state(): ConnectionState {
    const value = this.actor.getSnapshot().value;
    return isConnectionState(value) ? value : 'closed';
  }

  get closeCode(): number | undefined {
    return this.actor.getSnapshot().context.closeCode;
  }

  get closeReason(): string | undefined {
    return this.actor.getSnapshot().context.closeReason;
  }

  get isTerminal(): boolean {
    return this.state === 'closed' || this.state === 'rejected';
  }

  send(event: ConnectionEvent): boolean {
    if (!this.actor.getSnapshot().can(event)) {
      return false;
    }
    this.actor.send(event);
    return true;
  }

  stop(): void {
    this.actor.stop();
  }
}
