import { Controller, Get, HttpStatus, Inject } from '@nestjs/common';
import { ApiOkResponse, ApiOperation, ApiTags } from '@nestjs/swagger';

import { INJECTION_TOKENS } from '../../common/constants/injection-tokens';
import type { IMetricsSink } from '../../common/interfaces/metrics-sink.interface';
import { ApiResponse } from '../../common/types/api-response.type';
import { EndpointHealthRegistry } from '../endpoints/application/endpoint-health.registry';
import { EndpointStatus, EndpointStatusSummary } from '../endpoints/domain/models/endpoint.model';
import { ConnectionRegistryService } from '../realtime/application/connection-registry.service';

export interface HealthReport {
  status: 'ok' | 'degraded';
  uptime: number;
  endpoints: EndpointStatusSummary;
  connections: number;
  metrics: Record<string, number>;
}

@ApiTags('Health')
@Controller('health')
export class HealthController {
  constructor(
    private readonly endpointRegistry: EndpointHealthRegistry,
    private readonly connectionRegistry: ConnectionRegistryService,
    @Inject(INJECTION_TOKENS.METRICS_SINK) private readonly metrics: IMetricsSink,
  ) {}

  /**
   * GET /health (fuera del prefijo global)
   */
  @Get()
  @ApiOperation({ summary: 'Estado del servicio' })
  @ApiOkResponse({ description: 'Resumen de endpoints, conexiones abiertas y contadores' })
  check(): ApiResponse<HealthReport> {
    const endpoints = this.endpointRegistry.summary();

    return ApiResponse.ok<HealthReport>(HttpStatus.OK, {
      status: endpoints[EndpointStatus.DOWN] > 0 ? 'degraded' : 'ok',
      uptime: Math.floor(process.uptime()),
      endpoints,
      connections: this.connectionRegistry.count(),
      metrics: this.metrics.snapshot(),
    });
  }
}
