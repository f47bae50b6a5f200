export * from './audience.routes';
export * from './campaign-send.routes';
export * from './campaign.routes';
export * from './health.routes';
export * from './metrics.routes';
export * from './promo-code.routes';
