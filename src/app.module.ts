// Nest Modules
import { MiddlewareConsumer, Module, NestModule, RequestMethod } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { MongooseModule } from '@nestjs/mongoose';
import { ScheduleModule } from '@nestjs/schedule';
import cookieParser from 'cookie-parser';

// Shared Modules
import { AuthModule } from './modules/auth/auth.module';
import { CachingModule, resolveCacheDriver } from './common/cache/caching.module';
import { CommonModule } from './common/common.module';
import { CsrfModule } from './modules/csrf/csrf.module';
import { EndpointsModule } from './modules/endpoints/endpoints.module';
import { EventBusModule } from './modules/event-bus/event-bus.module';
import { HealthModule } from './modules/health/health.module';
import { RateLimitModule } from './modules/rate-limit/rate-limit.module';
import { RealtimeModule } from './modules/realtime/realtime.module';
import { SharedContextModule } from './shared/shared-context.module';
import { TokensModule } from './modules/tokens/tokens.module';
import { UsersModule } from './modules/users/users.module';

// Filters
import { ApiExceptionFilter } from './common/filters/api-exception.filter';

// Middlewares
import { ApiKeyMiddleware, RequestIdMiddleware } from './middlewares';

// Config Schema
import { configValidationSchema } from './config/config.schema';

@Module({
  imports: [
    // ⭐ SharedContextModule: Importar PRIMERO para que ClsService esté disponible globalmente
    SharedContextModule,

    // Validation Schemas
    ConfigModule.forRoot({
      validationSchema: configValidationSchema,
      isGlobal: true,
    }),

    // Events & scheduling
    EventEmitterModule.forRoot(),
    ScheduleModule.forRoot(),

    // MongoDB connection
    MongooseModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) => ({
        uri: config.getOrThrow<string>('DB_HOST'),
      }),
    }),

    // Cache & pub/sub (redis | memory)
    CachingModule.forRoot(resolveCacheDriver(process.env.CACHE_DRIVER)),

    // Modules
    CommonModule,
    AuthModule,
    CsrfModule,
    EndpointsModule,
    EventBusModule,
    HealthModule,
    RateLimitModule,
    RealtimeModule,
    TokensModule,
    UsersModule,
  ],
  providers: [
    {
      provide: APP_FILTER,
      useClass: ApiExceptionFilter,
    },
  ],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer): void {
    // PRIMERO: Cookie parser, para que las cookies estén disponibles en request
    const cookieSecret = process.env.COOKIE_SECRET || 'dev-cookie-secret';
    consumer.apply(cookieParser(cookieSecret)).forRoutes('*');

    consumer.apply(RequestIdMiddleware).forRoutes('*');

    // x-api-key solo en rutas servicio a servicio
    consumer
      .apply(ApiKeyMiddleware)
      .forRoutes(
        { path: 'auth/token', method: RequestMethod.POST },
        { path: 'endpoints', method: RequestMethod.POST },
        { path: 'endpoints/:id/status', method: RequestMethod.PUT },
      );
  }
}
