import { Module } from '@nestjs/common';

import { AuthModule } from '../auth/auth.module';
import { CsrfModule } from '../csrf/csrf.module';
import { EndpointsModule } from '../endpoints/endpoints.module';
import { EventBusModule } from '../event-bus/event-bus.module';
import { UsersModule } from '../users/users.module';
import { ChannelMembershipModule } from './channel-membership.module';

import { ConnectionRegistryService } from './application/connection-registry.service';
import { HandshakeAuthenticator } from './application/handshake-authenticator.service';
import { RealtimeGatewayService } from './application/realtime-gateway.service';
import { RealtimeMessageRouter } from './application/realtime-message.router';
import { RealtimePublisher } from './application/realtime-publisher.service';
import { RealtimeController } from './infrastructure/controllers/realtime.controller';
import { RealtimeGateway } from './infrastructure/gateways/realtime.gateway';
import { RevocationPushListener } from './infrastructure/listeners/revocation-push.listener';

/**
 * Módulo realtime.
 * - Gateway WebSocket con ciclo de vida modelado en xstate
 * - Registro de conexiones (arena + índice por subject)
 * - Fan-out por pub/sub y cierre activo al revocar un token
 *
 * Exports:
 * - ConnectionRegistryService
 * - RealtimePublisher
 */
@Module({
  imports: [
    AuthModule,
    ChannelMembershipModule,
    CsrfModule,
    EndpointsModule,
    EventBusModule,
    UsersModule,
  ],
  controllers: [RealtimeController],
  providers: [
    ConnectionRegistryService,
    HandshakeAuthenticator,
    RealtimeGatewayService,
    RealtimeMessageRouter,
    RealtimePublisher,
    RealtimeGateway,
    RevocationPushListener,
  ],
  exports: [ConnectionRegistryService, RealtimePublisher],
})
export class RealtimeModule {}
