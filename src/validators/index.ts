export * from './audience.schemas';
export * from './campaign.schemas';
export * from './campaign-send.schemas';
export * from './promo-code.schemas';
