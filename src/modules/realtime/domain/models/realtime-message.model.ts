/**
 * Tramas del protocolo realtime (JSON sobre texto).
 */

export const CONTROL_MESSAGE_TYPE = '__control';

export interface RevokeControlFrame {
  type: typeof CONTROL_MESSAGE_TYPE;
  action: 'revoke';
  jti: string;
}

export type ControlFrame = RevokeControlFrame;

/**
 * Qué debe hacer la sesión con un mensaje entrante ya enrutado.
 */
export type RouteAction =
  | { kind: 'reply'; frame: string }
  | { kind: 'join'; channelId: string }
  | { kind: 'leave'; channelId: string };

export const UNKNOWN_MESSAGE_TYPE = 'Unknown message type';
export const CHANNEL_NOT_AUTHORIZED = 'Not authorized for this channel.';

const seconds = (epochMs: number): number => epochMs / 1000;

export const frames = {
  pong: (now: number): string => JSON.stringify({ type: 'pong', timestamp: seconds(now) }),
  ping: (now: number): string => JSON.stringify({ type: 'ping', timestamp: seconds(now) }),
  error: (message: string): string => JSON.stringify({ type: 'error', error: message }),
  channelJoined: (channelId: string): string =>
    JSON.stringify({ type: 'channel_joined', channel_id: channelId }),
  commandResult: (commandId: string | number | null): string =>
    JSON.stringify({ type: 'command_result', command_id: commandId, status: 'processed' }),
  echo: (text: string): string => `Received: ${text}`,
  control: (frame: ControlFrame): string => JSON.stringify(frame),
};

/**
 * Reconoce una trama de control interna; cualquier otra cosa devuelve null.
 */
export function parseControlFrame(raw: string): ControlFrame | null {
  if (!raw.includes(CONTROL_MESSAGE_TYPE)) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }

  if (
    typeof parsed === 'object' &&
    parsed !== null &&
    'type' in parsed &&
    parsed.type === CONTROL_MESSAGE_TYPE &&
    'action' in parsed &&
    parsed.action === 'revoke' &&
    'jti' in parsed &&
    typeof parsed.jti === 'string'
  ) {
    return { type: CONTROL_MESSAGE_TYPE, action: 'revoke', jti: parsed.jti };
  }

  return null;
}
