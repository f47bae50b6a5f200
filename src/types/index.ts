export * from './audience.types';
export * from './audit.types';
export * from './campaign.types';
export * from './campaign-send.types';
export * from './promo-code.types';
export * from './tenant.types';
