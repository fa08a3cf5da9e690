export enum EndpointStatus {
  HEALTHY = 'healthy',
  DEGRADED = 'degraded',
  DOWN = 'down',
  UNKNOWN = 'unknown',
  STARTING = 'starting',
  MAINTENANCE = 'maintenance',
  PLANNED = 'planned',
}

export const ENDPOINT_HISTORY_LIMIT = 100;
export const DEFAULT_ENDPOINT_CATEGORY = 'general';

export type EndpointMetadata = Record<string, unknown>;

export interface StatusTransition {
  previousStatus: EndpointStatus;
  newStatus: EndpointStatus;
  timestamp: Date;
  metadata: EndpointMetadata;
}

export interface EndpointInfo {
  endpointId: string;
  name: string;
  description: string;
  category: string;
  status: EndpointStatus;
  lastChecked: Date;
  metadata: EndpointMetadata;
  tags: string[];
  /** Solo transiciones reales, las más antiguas primero */
  history: StatusTransition[];
}

export interface RegisterEndpointOptions {
  description?: string;
  category?: string;
  status?: EndpointStatus;
  metadata?: EndpointMetadata;
  tags?: string[];
}

export type EndpointStatusSummary = Record<EndpointStatus, number>;
