import { Pool } from 'pg';
import { AudienceResolverService } from './audience-resolver.service';
import { CampaignMetricsService } from './campaign-metrics.service';
import { CampaignSendService } from './campaign-send.service';
import { CampaignService } from './campaign.service';
import { PromoCodeService } from './promo-code.service';

export * from './audience-resolver.service';
export * from './campaign-metrics.service';
export * from './campaign-send.service';
export * from './campaign.service';
export * from './promo-code-generator.service';
export * from './promo-code.service';

export interface AppServices {
  campaignService: CampaignService;
  promoCodeService: PromoCodeService;
  sendService: CampaignSendService;
  metricsService: CampaignMetricsService;
}

/**
 * One set of services sharing a pool; the campaign service reuses the others.
 */
export function createServices(pool: Pool): AppServices {
  const promoCodeService = new PromoCodeService(pool);
  const sendService = new CampaignSendService(pool);
  const metricsService = new CampaignMetricsService(pool);
  const campaignService = new CampaignService(pool, {
    audienceResolver: new AudienceResolverService(pool),
    sendService,
    metricsService,
    promoCodeService,
  });

  return { campaignService, promoCodeService, sendService, metricsService };
}
