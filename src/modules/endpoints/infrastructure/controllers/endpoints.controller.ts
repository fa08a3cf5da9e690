import type { Response } from 'express';

import {
  Body,
  Controller,
  Get,
  HttpStatus,
  Param,
  Post,
  Put,
  Query,
  Res,
} from '@nestjs/common';
import {
  ApiCreatedResponse,
  ApiHeader,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiSecurity,
  ApiTags,
} from '@nestjs/swagger';

import { ApiResponse } from '../../../../common/types/api-response.type';
import { EndpointHealthRegistry } from '../../application/endpoint-health.registry';
import { EndpointInfo, EndpointStatusSummary } from '../../domain/models/endpoint.model';
import {
  EndpointInfoDto,
  ListEndpointsQueryDto,
  RegisterEndpointDto,
  UpdateEndpointStatusDto,
} from '../../dto/endpoints.dto';

@ApiTags('Endpoints')
@Controller('endpoints')
export class EndpointsController {
  constructor(private readonly registry: EndpointHealthRegistry) {}

  /**
   * GET /endpoints?category&status&tag
   * Los filtros se combinan (intersección)
   */
  @Get()
  @ApiOperation({ summary: 'Listar endpoints' })
  @ApiOkResponse({ type: [EndpointInfoDto] })
  list(@Query() query: ListEndpointsQueryDto, @Res() res: Response): Response {
    const endpoints = this.registry
      .list()
      .filter((info) => query.category === undefined || info.category === query.category)
      .filter((info) => query.status === undefined || info.status === query.status)
      .filter((info) => query.tag === undefined || info.tags.includes(query.tag));

    const response = ApiResponse.ok<EndpointInfo[]>(HttpStatus.OK, endpoints, undefined, {
      count: endpoints.length,
    });
    return res.status(response.statusCode).json(response);
  }

  @Get('summary')
  @ApiOperation({ summary: 'Resumen de endpoints por estado' })
  summary(@Res() res: Response): Response {
    const response = ApiResponse.ok<EndpointStatusSummary>(HttpStatus.OK, this.registry.summary());
    return res.status(response.statusCode).json(response);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Detalle de un endpoint con su historial' })
  @ApiOkResponse({ type: EndpointInfoDto })
  @ApiNotFoundResponse({ description: 'Endpoint desconocido' })
  findOne(@Param('id') id: string, @Res() res: Response): Response {
    const info = this.registry.get(id);
    const response = info
      ? ApiResponse.ok<EndpointInfo>(HttpStatus.OK, info)
      : ApiResponse.fail<EndpointInfo>(HttpStatus.NOT_FOUND, `Endpoint ${id} not found`);
    return res.status(response.statusCode).json(response);
  }

  /**
   * POST /endpoints (x-api-key)
   */
  @Post()
  @ApiSecurity('x-api-key')
  @ApiHeader({ name: 'x-api-key', required: true })
  @ApiOperation({ summary: 'Registrar o fusionar un endpoint' })
  @ApiCreatedResponse({ type: EndpointInfoDto })
  register(@Body() dto: RegisterEndpointDto, @Res() res: Response): Response {
    const info = this.registry.register(dto.endpointId, dto.name, {
      description: dto.description,
      category: dto.category,
      status: dto.status,
      metadata: dto.metadata,
      tags: dto.tags,
    });

    const response = ApiResponse.ok<EndpointInfo>(
      HttpStatus.CREATED,
      info,
      'Endpoint registrado exitosamente',
    );
    return res.status(response.statusCode).json(response);
  }

  /**
   * PUT /endpoints/:id/status (x-api-key)
   */
  @Put(':id/status')
  @ApiSecurity('x-api-key')
  @ApiHeader({ name: 'x-api-key', required: true })
  @ApiOperation({ summary: 'Actualizar el estado de un endpoint' })
  @ApiOkResponse({ type: EndpointInfoDto })
  @ApiNotFoundResponse({ description: 'Endpoint desconocido' })
  updateStatus(
    @Param('id') id: string,
    @Body() dto: UpdateEndpointStatusDto,
    @Res() res: Response,
  ): Response {
    const result = this.registry.updateStatus(id, dto.status, dto.metadata);

    const response = result.isFailure
      ? ApiResponse.fail<EndpointInfo>(HttpStatus.NOT_FOUND, result.getError().message)
      : ApiResponse.ok<EndpointInfo>(HttpStatus.OK, result.getValue(), 'Estado actualizado');
    return res.status(response.statusCode).json(response);
  }
}
