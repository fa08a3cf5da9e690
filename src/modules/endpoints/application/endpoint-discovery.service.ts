import { Injectable, Logger, OnApplicationBootstrap, RequestMethod } from '@nestjs/common';
import { METHOD_METADATA, PATH_METADATA } from '@nestjs/common/constants';
import { DiscoveryService, MetadataScanner, Reflector } from '@nestjs/core';

import { buildRoutePath } from '../../../common/constants/app.constants';
import { EndpointStatus } from '../domain/models/endpoint.model';
import { EndpointHealthRegistry } from './endpoint-health.registry';

const toPaths = (value: string | string[] | undefined): string[] => {
  if (value === undefined) {
    return [''];
  }
  return Array.isArray(value) ? value : [value];
};

/**
 * Registra cada ruta de controlador como `{METHOD}:{path}` en estado
 * `starting` al arrancar la aplicación.
 */
@Injectable()
export class EndpointDiscoveryService implements OnApplicationBootstrap {
  private readonly logger = new Logger(EndpointDiscoveryService.name);

  constructor(
    private readonly discoveryService: DiscoveryService,
    private readonly metadataScanner: MetadataScanner,
    private readonly reflector: Reflector,
    private readonly registry: EndpointHealthRegistry,
  ) {}

  onApplicationBootstrap(): void {
    const registered = this.discover();
    this.logger.log(`Discovered ${registered} HTTP endpoints`);
  }

  discover(): number {
    let registered = 0;

    for (const wrapper of this.discoveryService.getControllers()) {
      const { instance, metatype } = wrapper;
      if (!instance || !metatype) {
        continue;
      }

      const controllerPaths = toPaths(
        this.reflector.get<string | string[] | undefined>(PATH_METADATA, metatype),
      );
      const prototype: object = Object.getPrototypeOf(instance);

      for (const methodName of this.metadataScanner.getAllMethodNames(prototype)) {
        const handler: unknown = Reflect.get(prototype, methodName);
        if (typeof handler !== 'function') {
          continue;
        }

        const handlerPath = this.reflector.get<string | string[] | undefined>(PATH_METADATA, handler);
        if (handlerPath === undefined) {
          continue;
        }

        const requestMethod =
          this.reflector.get<RequestMethod | undefined>(METHOD_METADATA, handler) ??
          RequestMethod.GET;
        const method = RequestMethod[requestMethod];

        for (const controllerPath of controllerPaths) {
          for (const path of toPaths(handlerPath)) {
            const route = buildRoutePath(controllerPath, path);
            this.registry.register(`${method}:${route}`, `${method} ${route}`, {
              category: metatype.name,
              status: EndpointStatus.STARTING,
              metadata: { handler: methodName },
              tags: ['http'],
            });
            registered++;
          }
        }
      }
    }

    return registered;
  }
}
