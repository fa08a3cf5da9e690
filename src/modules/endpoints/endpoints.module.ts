import { Module } from '@nestjs/common';
import { DiscoveryModule } from '@nestjs/core';

import { EndpointDiscoveryService } from './application/endpoint-discovery.service';
import { EndpointHealthRegistry } from './application/endpoint-health.registry';
import { EndpointsController } from './infrastructure/controllers/endpoints.controller';

/**
 * Módulo de catálogo y salud de endpoints.
 * - Registro de endpoints con historial de transiciones
 * - Autodescubrimiento de rutas HTTP al arrancar
 */
@Module({
  imports: [DiscoveryModule],
  controllers: [EndpointsController],
  providers: [EndpointHealthRegistry, EndpointDiscoveryService],
  exports: [EndpointHealthRegistry],
})
export class EndpointsModule {}
