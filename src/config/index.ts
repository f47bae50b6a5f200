export * from './campaign.config';
export * from './database';
export * from './env.validator';
