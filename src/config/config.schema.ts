// Third´s Modules
import * as joi from 'joi';
import 'dotenv/config';

/**
 * Variables de entorno
 */
export type EnvVars = {
  PORT: number;
  DB_HOST: string;
  API_KEY: string;
  JWT_SECRET: string;
  JWT_ALGORITHM: 'HS256' | 'HS384' | 'HS512';
  ACCESS_TOKEN_TTL: number;
  REFRESH_TOKEN_TTL: number;
  CACHE_DRIVER: 'redis' | 'memory';
  REDIS_HOST?: string;
  REDIS_PORT: number;
  REDIS_PASSWORD?: string;
  REDIS_ROOT_KEY: string;
  RATE_LIMIT_ADMIN: number;
  RATE_LIMIT_USER: number;
  RATE_LIMIT_GUEST: number;
  EVENT_BUS_HISTORY_SIZE: number;
  WS_RECEIVE_TIMEOUT_MS: number;
  WS_LIVENESS_MS: number;
  WS_FANOUT_QUEUE_SIZE: number;
  REVOCATION_CHECK_DURABLE_ON_MISS: boolean;
  COOKIE_SECRET: string;
  CORS_ORIGIN: string;
  TRUST_PROXY: string;
};

/**
 * Validate env variables
 */
export const configValidationSchema: joi.ObjectSchema<EnvVars> = joi
  .object<EnvVars>({
    PORT: joi.number().port().default(9053),
    DB_HOST: joi.string().required(),
    API_KEY: joi.string().required(),
    JWT_SECRET: joi.string().min(8).required(),
    JWT_ALGORITHM: joi.string().valid('HS256', 'HS384', 'HS512').default('HS256'),
    ACCESS_TOKEN_TTL: joi.number().integer().positive().default(1800),
    REFRESH_TOKEN_TTL: joi.number().integer().positive().default(604800),
    CACHE_DRIVER: joi.string().valid('redis', 'memory').default('redis'),
    REDIS_HOST: joi.string().when('CACHE_DRIVER', {
      is: 'redis',
      then: joi.required(),
      otherwise: joi.optional(),
    }),
    REDIS_PORT: joi.number().port().default(6379),
    REDIS_PASSWORD: joi.string().allow('').optional(),
    REDIS_ROOT_KEY: joi.string().default('realtime-gateway'),
    RATE_LIMIT_ADMIN: joi.number().integer().positive().default(1000),
    RATE_LIMIT_USER: joi.number().integer().positive().default(100),
    RATE_LIMIT_GUEST: joi.number().integer().positive().default(20),
    EVENT_BUS_HISTORY_SIZE: joi.number().integer().positive().default(100),
    WS_RECEIVE_TIMEOUT_MS: joi.number().integer().positive().default(100),
    WS_LIVENESS_MS: joi.number().integer().positive().default(30000),
    WS_FANOUT_QUEUE_SIZE: joi.number().integer().positive().default(1000),
    REVOCATION_CHECK_DURABLE_ON_MISS: joi.boolean().default(false),
    COOKIE_SECRET: joi.string().default('dev-cookie-secret'),
    CORS_ORIGIN: joi.string().default('http://localhost:4200'),
    TRUST_PROXY: joi.string().default('1'),
  })
  .unknown(true);
