import { BaseDomainEvent } from '../../../../common/events/base-domain.event';
import { EndpointMetadata, EndpointStatus } from '../models/endpoint.model';

export const ENDPOINT_EVENTS = {
  STATUS_CHANGED: 'endpoint.status_changed',
} as const;

export class EndpointStatusChangedEvent extends BaseDomainEvent {
  readonly eventName = ENDPOINT_EVENTS.STATUS_CHANGED;

  constructor(
    public readonly endpointId: string,
    public readonly previousStatus: EndpointStatus,
    public readonly newStatus: EndpointStatus,
    public readonly metadata: EndpointMetadata,
  ) {
    super();
  }
}
