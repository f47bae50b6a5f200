export * from './error-handler.middleware';
export * from './tenant.middleware';
export * from './validation.middleware';
