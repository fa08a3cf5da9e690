import type { Response } from 'express';

import {
  Body,
  Controller,
  Get,
  HttpStatus,
  Param,
  Post,
  Res,
  UseGuards,
} from '@nestjs/common';
import {
  ApiBearerAuth,
  ApiForbiddenResponse,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
} from '@nestjs/swagger';

import { ApiResponse } from '../../../../common/types/api-response.type';
import { Roles } from '../../../auth/decorators/roles.decorator';
import { JwtAuthGuard } from '../../../auth/guards/jwt-auth.guard';
import { RolesGuard } from '../../../auth/guards/roles.guard';
import { RateLimitGuard } from '../../../rate-limit/guards/rate-limit.guard';
import { ConnectionRegistryService } from '../../application/connection-registry.service';
import { RealtimePublisher } from '../../application/realtime-publisher.service';
import { Connection } from '../../domain/models/connection.model';
import { roleChannel, userChannel } from '../../domain/models/realtime-channels';
import { ConnectionViewDto, PublishRealtimeDto, PublishResultDto } from '../../dto/realtime.dto';

/**
 * Difusión HTTP hacia las conexiones realtime (solo admin).
 */
@ApiTags('Realtime')
@ApiBearerAuth('Bearer Token')
@Roles('admin')
@UseGuards(JwtAuthGuard, RolesGuard, RateLimitGuard)
@Controller('realtime')
export class RealtimeController {
  constructor(
    private readonly publisher: RealtimePublisher,
    private readonly registry: ConnectionRegistryService,
  ) {}

  @Post('users/:subject')
  @ApiOperation({ summary: 'Enviar un mensaje a todas las conexiones de un usuario' })
  @ApiOkResponse({ type: PublishResultDto })
  @ApiForbiddenResponse({ description: 'Requiere rol admin' })
  async publishToUser(
    @Param('subject') subject: string,
    @Body() dto: PublishRealtimeDto,
    @Res() res: Response,
  ): Promise<Response> {
    const receivers = await this.publisher.publishToUser(subject, dto.payload);
    const response = ApiResponse.ok<PublishResultDto>(HttpStatus.OK, {
      channel: userChannel(subject),
      receivers,
    });
    return res.status(response.statusCode).json(response);
  }

  @Post('roles/:role')
  @ApiOperation({ summary: 'Difundir un mensaje a todas las conexiones con un rol' })
  @ApiOkResponse({ type: PublishResultDto })
  @ApiForbiddenResponse({ description: 'Requiere rol admin' })
  async publishToRole(
    @Param('role') role: string,
    @Body() dto: PublishRealtimeDto,
    @Res() res: Response,
  ): Promise<Response> {
    const receivers = await this.publisher.publishToRole(role, dto.payload);
    const response = ApiResponse.ok<PublishResultDto>(HttpStatus.OK, {
      channel: roleChannel(role),
      receivers,
    });
    return res.status(response.statusCode).json(response);
  }

  @Get('connections')
  @ApiOperation({ summary: 'Listar conexiones abiertas en esta instancia' })
  @ApiOkResponse({ type: [ConnectionViewDto] })
  listConnections(@Res() res: Response): Response {
    const connections = this.registry.list().map((connection) => this.toView(connection));
    const response = ApiResponse.ok<ConnectionViewDto[]>(HttpStatus.OK, connections, undefined, {
      count: connections.length,
      subjects: this.registry.subjectCount(),
    });
    return res.status(response.statusCode).json(response);
  }

  private toView(connection: Connection): ConnectionViewDto {
    return {
      connection_id: connection.connectionId,
      subject: connection.subject,
      roles: [...connection.roles],
      connected_at: connection.connectedAt.toISOString(),
      last_activity: new Date(connection.lastActivity).toISOString(),
      channels: [...connection.subscribedChannels].sort(),
      state: connection.state,
    };
  }
}
