import type { Response } from 'express';

import {
  Body,
  Controller,
  Get,
  HttpStatus,
  Logger,
  Param,
  Post,
  Query,
  Res,
  UseGuards,
} from '@nestjs/common';
import {
  ApiBearerAuth,
  ApiCreatedResponse,
  ApiForbiddenResponse,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
  ApiTooManyRequestsResponse,
} from '@nestjs/swagger';

import type { Actor } from '../../../../common/interfaces/actor.interface';
import { ApiResponse } from '../../../../common/types/api-response.type';
import { CurrentActor } from '../../../auth/decorators/current-actor.decorator';
import { Roles } from '../../../auth/decorators/roles.decorator';
import { JwtAuthGuard } from '../../../auth/guards/jwt-auth.guard';
import { RolesGuard } from '../../../auth/guards/roles.guard';
import { RateLimitGuard } from '../../../rate-limit/guards/rate-limit.guard';
import { EventBusService } from '../../application/event-bus.service';
import { EventTopicAccessService } from '../../application/event-topic-access.service';
import { EventMessage } from '../../domain/models/event-message.model';
import { EventMessageDto, PollEventsQueryDto, PublishEventDto } from '../../dto/events.dto';

/**
 * Polling HTTP del historial del EventBus para clientes que llegan tarde.
 */
@ApiTags('Events')
@ApiBearerAuth('Bearer Token')
@UseGuards(JwtAuthGuard, RolesGuard, RateLimitGuard)
@Controller('events')
export class EventsController {
  private readonly logger = new Logger(EventsController.name);

  constructor(
    private readonly eventBus: EventBusService,
    private readonly topicAccess: EventTopicAccessService,
  ) {}

  /**
   * GET /events/:topic?since=
   * Los tópicos de usuario, rol y canal se filtran con EventTopicAccessService
   */
  @Get(':topic')
  @ApiOperation({ summary: 'Consultar historial de un tópico' })
  @ApiOkResponse({ description: 'Mensajes en orden de publicación', type: [EventMessageDto] })
  @ApiForbiddenResponse({ description: 'Tópico privado de otro usuario, rol o canal' })
  @ApiTooManyRequestsResponse({ description: 'Rate limit excedido' })
  async poll(
    @CurrentActor() actor: Actor,
    @Param('topic') topic: string,
    @Query() query: PollEventsQueryDto,
    @Res() res: Response,
  ): Promise<Response> {
    if (!(await this.topicAccess.canRead(actor, topic))) {
      const response = ApiResponse.fail<EventMessageDto[]>(
        HttpStatus.FORBIDDEN,
        'No autorizado para este tópico',
      );
      return res.status(response.statusCode).json(response);
    }

    const messages = this.eventBus.poll(topic, query.since);
    const response = ApiResponse.ok<EventMessageDto[]>(
      HttpStatus.OK,
      messages.map((message) => this.toDto(message)),
      undefined,
      { topic, count: messages.length },
    );
    return res.status(response.statusCode).json(response);
  }

  @Post(':topic')
  @Roles('admin')
  @ApiOperation({ summary: 'Publicar un evento (admin)' })
  @ApiCreatedResponse({ description: 'Evento publicado', type: EventMessageDto })
  async publish(
    @CurrentActor() actor: Actor,
    @Param('topic') topic: string,
    @Body() dto: PublishEventDto,
    @Res() res: Response,
  ): Promise<Response> {
    const message = await this.eventBus.publish(topic, dto.payload);
    this.logger.log(`Event ${message.id} published on ${topic} by ${actor.sub}`);

    const response = ApiResponse.ok<EventMessageDto>(
      HttpStatus.CREATED,
      this.toDto(message),
      'Evento publicado',
    );
    return res.status(response.statusCode).json(response);
  }

  private toDto(message: EventMessage): EventMessageDto {
    return {
      id: message.id,
      topic: message.topic,
      timestamp: message.timestamp,
      payload: message.payload,
    };
  }
}
