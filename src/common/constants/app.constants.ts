/**
 * Prefijo global de la API HTTP y rutas que quedan fuera de él.
 */
export const API_PREFIX = 'api/v1';

export const UNPREFIXED_ROUTES = ['health'];

/**
 * Ruta del gateway WebSocket (los gateways no reciben el prefijo global).
 */
export const REALTIME_WS_PATH = `/${API_PREFIX}/ws`;

/**
 * Construye la ruta pública de un handler a partir de su controlador.
 */
export function buildRoutePath(controllerPath: string, handlerPath: string): string {
  const segments = [controllerPath, handlerPath]
    .map((segment) => segment.replace(/^\/+|\/+$/g, ''))
    .filter((segment) => segment.length > 0);

  const root = segments[0] ?? '';
  const prefixed = UNPREFIXED_ROUTES.includes(root)
    ? segments
    : [API_PREFIX, ...segments];

  return `/${prefixed.join('/')}`;
}
