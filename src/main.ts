import { json, urlencoded } from 'express';

// Nest Modules
import { Logger, ValidationPipe, RequestMethod } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { WsAdapter } from '@nestjs/platform-ws';
import {
  DocumentBuilder,
  SwaggerCustomOptions,
  SwaggerModule,
} from '@nestjs/swagger';

// Third's Modules
import { WinstonModule } from 'nest-winston';
import * as winston from 'winston';
import helmet from 'helmet';

// App Module
import { AppModule } from './app.module';
import { API_PREFIX, REALTIME_WS_PATH, UNPREFIXED_ROUTES } from './common/constants/app.constants';
import { EndpointHealthRegistry } from './modules/endpoints/application/endpoint-health.registry';
import { EndpointStatus } from './modules/endpoints/domain/models/endpoint.model';

const readField = (info: winston.Logform.TransformableInfo, key: string): string => {
  const value: unknown = info[key];
  return typeof value === 'string' ? value : '';
};

/**
 *  Start the application
 */
async function bootstrap(): Promise<void> {
  // Logger
  const logger = new Logger('bootstrap');

  // App
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    logger: WinstonModule.createLogger({
      transports: [
        new winston.transports.Console({
          format: winston.format.combine(
            winston.format.colorize({ all: true }),
            winston.format.timestamp({
              format: 'YYYY-MM-DD hh:mm:ss.SSS A',
            }),
            winston.format.align(),
            winston.format.printf((info) => {
              const context = readField(info, 'context');
              const message =
                typeof info.message === 'string'
                  ? info.message
                  : JSON.stringify(info.message);
              return `[${readField(info, 'timestamp')}] ${info.level}: ${context ? `[${context}] ` : ''}${message}`;
            }),
          ),
        }),
        new winston.transports.File({
          filename: 'logs/error.log',
          level: 'error',
        }),
        new winston.transports.File({ filename: 'logs/combined.log' }),
      ],
    }),
    bufferLogs: true,
  });

  const config = app.get(ConfigService);

  // ⭐ 'trust proxy' para que req.ip refleje X-Forwarded-For (rate limit de invitados)
  const trustProxy = config.get<string>('TRUST_PROXY') ?? '1';
  app.set('trust proxy', trustProxy === 'true' ? true : trustProxy);

  // WebSockets (ws nativo, ruta /api/v1/ws)
  app.useWebSocketAdapter(new WsAdapter(app));

  // Cors - Configurado con credentials para cookies
  const allowedOrigins = (config.get<string>('CORS_ORIGIN') ?? 'http://localhost:4200')
    .split(',')
    .map((origin) => origin.trim());

  app.enableCors({
    origin: allowedOrigins,
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'x-api-key', 'x-request-id'],
    exposedHeaders: ['x-request-id', 'X-RateLimit-Limit', 'X-RateLimit-Remaining'],
    optionsSuccessStatus: 200,
    maxAge: 86400, // 24 horas de cache en preflight
  });

  // Global configuration
  app.setGlobalPrefix(API_PREFIX, {
    exclude: UNPREFIXED_ROUTES.map((path) => ({ path, method: RequestMethod.GET })),
  });

  // Global pipe
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      transformOptions: {
        enableImplicitConversion: false,
      },
    }),
  );

  // Securities modules
  app.use(helmet());

  // Load data in request
  app.use(json({ limit: '1mb' }));
  app.use(urlencoded({ extended: true, limit: '1mb' }));

  const port = config.get<number>('PORT') ?? 9053;

  // Metadata for Swagger
  const metaData = new DocumentBuilder()
    .setTitle('Realtime Gateway')
    .setDescription('Gateway realtime, ciclo de vida de tokens y salud de endpoints')
    .setVersion('0.1.0')
    .addServer(`http://127.0.0.1:${port}`)
    .addBearerAuth(
      {
        type: 'http',
        scheme: 'bearer',
        bearerFormat: 'JWT',
        name: 'JWT',
        description: 'Enter JWT token',
        in: 'header',
      },
      'Bearer Token',
    )
    .addApiKey(
      {
        type: 'apiKey',
        name: 'x-api-key',
        in: 'header',
      },
      'x-api-key',
    )
    .build();

  // Swagger options
  const swaggerCustomOptions: SwaggerCustomOptions = {
    customSiteTitle: 'Realtime Gateway Endpoints',
    jsonDocumentUrl: 'swagger/json',
  };

  // Swagger document
  const document = SwaggerModule.createDocument(app, metaData);
  SwaggerModule.setup('swagger', app, document, swaggerCustomOptions);

  // Define port
  await app.listen(port);

  // Endpoints descubiertos al arrancar: starting → healthy
  const promoted = app
    .get(EndpointHealthRegistry)
    .promote(EndpointStatus.STARTING, EndpointStatus.HEALTHY);

  const url = await app.getUrl();
  logger.log(
    `\n
       Realtime Gateway is running on: ${url}/${API_PREFIX}\n
        WebSocket 🔌 running on: ${url.replace(/^http/, 'ws')}${REALTIME_WS_PATH}\n
        Docs 📑 running on: ${url}/swagger/\n
        Health 💚 running on: ${url}/health (${promoted} endpoints healthy)\n
        `,
  );

  // Manejar excepciones no manejadas
  process.on('uncaughtException', (err) => {
    logger.error(`Uncaught Exception: ${err.message}`, err.stack);
  });

  // Manejar promesas rechazadas no manejadas
  process.on('unhandledRejection', (reason) => {
    logger.error(`Unhandled Rejection: ${reason instanceof Error ? reason.message : String(reason)}`);
  });
}

bootstrap().catch((error: unknown) => {
  const errorMsg = error instanceof Error ? error.message : String(error);
  new Logger('bootstrap').error(`Failed to start: ${errorMsg}`);
  process.exit(1);
});
