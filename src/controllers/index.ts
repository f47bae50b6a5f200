export * from './audience.controller';
export * from './campaign-send.controller';
export * from './campaign.controller';
export * from './promo-code.controller';
