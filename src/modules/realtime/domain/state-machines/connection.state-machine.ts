import { assign, setup } from 'xstate';

/**
 * Máquina de estados: ciclo de vida de una conexión WebSocket
 * Estados: connecting → authenticating → subscribed → active → closing → closed
 *          (+ rejected, terminal, desde connecting / authenticating)
 *
 * Transiciones:
 * - connecting → authenticating (el cliente presentó un token)
 * - connecting | authenticating → rejected (token ausente o inválido, CSRF, rate limit)
 * - authenticating → subscribed (registrada y suscrita a sus canales)
 * - subscribed → active (arranca el bucle principal)
 * - subscribed | active → closing (desconexión, error, ping fallido o revocación)
 * - closing → closed (recursos liberados)
 */

export type ConnectionState =
  | 'connecting'
  | 'authenticating'
  | 'subscribed'
  | 'active'
  | 'closing'
  | 'closed'
  | 'rejected';

export const CONNECTION_STATES: readonly ConnectionState[] = [
  'connecting',
  'authenticating',
  'subscribed',
  'active',
  'closing',
  'closed',
  'rejected',
];

export interface ConnectionStateContext {
  connectionId: string;
  subject?: string;
  closeCode?: number;
  closeReason?: string;
}

export interface ConnectionStateInput {
  connectionId: string;
}

export type ConnectionEvent =
  | { type: 'TOKEN_PRESENTED' }
  | { type: 'AUTHENTICATED'; subject: string }
  | { type: 'START' }
  | { type: 'REJECT'; code: number; reason: string }
  | { type: 'CLOSE'; code: number; reason: string }
  | { type: 'CLOSED' };

export const connectionStateMachine = setup({
  types: {
    context: {} as ConnectionStateContext,
    events: {} as ConnectionEvent,
    input: {} as ConnectionStateInput,
  },
  actions: {
    recordClose: assign({
      closeCode: ({ event }) =>
        event.type === 'REJECT' || event.type === 'CLOSE' ? event.code : undefined,
      closeReason: ({ event }) =>
        event.type === 'REJECT' || event.type === 'CLOSE' ? event.reason : undefined,
    }),
    recordSubject: assign({
      subject: ({ event, context }) =>
        event.type === 'AUTHENTICATED' ? event.subject : context.subject,
    }),
  },
}).createMachine({
  id: 'realtime-connection',
  initial: 'connecting',
  context: ({ input }) => ({ connectionId: input.connectionId }),
  states: {
    connecting: {
      on: {
        TOKEN_PRESENTED: { target: 'authenticating' },
        REJECT: { target: 'rejected', actions: 'recordClose' },
      },
    },
    authenticating: {
      on: {
        AUTHENTICATED: { target: 'subscribed', actions: 'recordSubject' },
        REJECT: { target: 'rejected', actions: 'recordClose' },
      },
    },
    subscribed: {
      on: {
        START: { target: 'active' },
        CLOSE: { target: 'closing', actions: 'recordClose' },
      },
    },
    active: {
      on: {
        CLOSE: { target: 'closing', actions: 'recordClose' },
      },
    },
    closing: {
      on: {
        CLOSED: { target: 'closed' },
      },
    },
    closed: {
      type: 'final',
    },
    rejected: {
      type: 'final',
    },
  },
});

export function isConnectionState(value: unknown): value is ConnectionState {
  return CONNECTION_STATES.some((state) => state === value);
}
