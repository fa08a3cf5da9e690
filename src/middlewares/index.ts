export * from './api-key.middleware';
export * from './request-id.middleware';
