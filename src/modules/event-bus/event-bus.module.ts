import { Module } from '@nestjs/common';

import { ChannelMembershipModule } from '../realtime/channel-membership.module';
import { EventBusService } from './application/event-bus.service';
import { EventTopicAccessService } from './application/event-topic-access.service';
import { EventsController } from './infrastructure/controllers/events.controller';
import { EventBusPubSubAdapter } from './infrastructure/adapters/event-bus-pubsub.adapter';

/**
 * EventBus en proceso con historial por tópico.
 *
 * Exporta:
 * - EventBusService: publish / subscribe / poll / openChannel
 * - EventBusPubSubAdapter: driver `memory` del puerto PUBSUB
 */
@Module({
  imports: [ChannelMembershipModule],
  controllers: [EventsController],
  providers: [EventBusService, EventBusPubSubAdapter, EventTopicAccessService],
  exports: [EventBusService, EventBusPubSubAdapter],
})
export class EventBusModule {}
