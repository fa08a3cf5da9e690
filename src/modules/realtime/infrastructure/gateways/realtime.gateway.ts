import type { IncomingMessage } from 'http';

import { Logger } from '@nestjs/common';
import { OnGatewayConnection, OnGatewayInit, WebSocketGateway } from '@nestjs/websockets';

import WebSocket from 'ws';

import { REALTIME_WS_PATH } from '../../../../common/constants/app.constants';
import { EndpointHealthRegistry } from '../../../endpoints/application/endpoint-health.registry';
import { EndpointStatus } from '../../../endpoints/domain/models/endpoint.model';
import { RealtimeGatewayService } from '../../application/realtime-gateway.service';
import { CLOSE_CODES } from '../../domain/models/realtime-channels';
import { WsSocketAdapter } from '../adapters/ws-socket.adapter';
import { parseHandshake } from '../adapters/handshake-request.parser';

export const REALTIME_ENDPOINT_ID = `WS:${REALTIME_WS_PATH}`;

/**
 * Punto de entrada WebSocket (`/api/v1/ws`). Cada conexión se delega al
 * RealtimeGatewayService, que la mantiene hasta que termina.
 */
@WebSocketGateway({ path: REALTIME_WS_PATH })
export class RealtimeGateway implements OnGatewayInit, OnGatewayConnection {
  private readonly logger = new Logger(RealtimeGateway.name);

  constructor(
    private readonly gatewayService: RealtimeGatewayService,
    private readonly endpointRegistry: EndpointHealthRegistry,
  ) {}

  afterInit(): void {
    this.endpointRegistry.register(REALTIME_ENDPOINT_ID, 'Realtime WebSocket gateway', {
      description: 'Conexiones realtime con fan-out por usuario, rol y canal',
      category: RealtimeGateway.name,
      status: EndpointStatus.STARTING,
      tags: ['websocket', 'realtime'],
    });
    this.logger.log(`Realtime gateway listening on ${REALTIME_WS_PATH}`);
  }

  async handleConnection(client: WebSocket, request: IncomingMessage): Promise<void> {
    const socket = new WsSocketAdapter(client);

    try {
      await this.gatewayService.serve(socket, parseHandshake(request));
    } catch (error) {
      const errorMsg = error instanceof Error ? error.message : String(error);
      this.logger.error(`Realtime connection failed: ${errorMsg}`);
      socket.close(CLOSE_CODES.INTERNAL_ERROR, 'Internal error');
    }
  }
}
