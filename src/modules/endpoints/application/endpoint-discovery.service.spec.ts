import { Controller, Get, Post } from '@nestjs/common';
import { DiscoveryModule } from '@nestjs/core';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { Test, TestingModule } from '@nestjs/testing';

import { EndpointStatus } from '../domain/models/endpoint.model';
import { EndpointDiscoveryService } from './endpoint-discovery.service';
import { EndpointHealthRegistry } from './endpoint-health.registry';

@Controller('widgets')
class WidgetsController {
  @Get()
  list(): string[] {
    return [];
  }

  @Post(':id/ping')
  ping(): string {
    return 'pong';
  }

  format(value: string): string {
    return value.trim();
  }
}

@Controller('health')
class ProbeController {
  @Get()
  check(): string {
    return 'ok';
  }
}

describe('EndpointDiscoveryService', () => {
  let discovery: EndpointDiscoveryService;
  let registry: EndpointHealthRegistry;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      imports: [DiscoveryModule],
      controllers: [WidgetsController, ProbeController],
      providers: [
        EndpointDiscoveryService,
        EndpointHealthRegistry,
        { provide: EventEmitter2, useValue: new EventEmitter2() },
      ],
    }).compile();

    discovery = module.get<EndpointDiscoveryService>(EndpointDiscoveryService);
    registry = module.get<EndpointHealthRegistry>(EndpointHealthRegistry);
  });

  it('should register every route handler as starting', () => {
    expect(discovery.discover()).toBe(3);

    expect(registry.list().map((info) => info.endpointId).sort()).toEqual([
      'GET:/api/v1/widgets',
      'GET:/health',
      'POST:/api/v1/widgets/:id/ping',
    ]);
    expect(registry.get('POST:/api/v1/widgets/:id/ping')).toEqual(
      expect.objectContaining({
        name: 'POST /api/v1/widgets/:id/ping',
        category: 'WidgetsController',
        status: EndpointStatus.STARTING,
        metadata: { handler: 'ping' },
        tags: ['http'],
      }),
    );
  });

  it('should be idempotent', () => {
    discovery.discover();
    discovery.discover();

    expect(registry.list()).toHaveLength(3);
  });
});
