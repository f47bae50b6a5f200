import { Pool } from 'pg';
import { campaignConfig } from '../config/campaign.config';
import { CustomerModel } from '../models/customer.model';
import { AudienceMember, AudienceType, ResolveMembersOptions, StoredAudienceSpec } from '../types';
import { buildAudienceFilter } from '../utils/audience-filter';
import { logger } from '../utils/logger';
import { campaignMetrics } from '../utils/metrics';

let locationRadiusNoticeLogged = false;

/**
 * Turns an audience into a count or a page of customers. Reads only;
 * every call reflects the customer table at that moment.
 */
export class AudienceResolverService {
  private customerModel: CustomerModel;

  constructor(pool: Pool, private clock: () => Date = () => new Date()) {
    this.customerModel = new CustomerModel(pool);
  }

  async resolveCount(restaurantId: string, spec: StoredAudienceSpec): Promise<number> {
    const endTimer = campaignMetrics.audienceResolveDuration.startTimer({ audience_type: spec.type, mode: 'count' });
    try {
      if (!(await this.customerModel.hasCustomers(restaurantId))) {
        return 0;
      }

      const filter = this.compile(spec);
      if (!filter) {
        return 0;
      }

      return await this.customerModel.countMatching(restaurantId, filter);
    } catch (error) {
      logger.error({ err: error, restaurantId, audienceType: spec.type }, 'Error resolving audience count');
      throw error;
    } finally {
      endTimer();
    }
  }

  async resolveMembers(
    restaurantId: string,
    spec: StoredAudienceSpec,
    options: ResolveMembersOptions = {}
  ): Promise<AudienceMember[]> {
    const endTimer = campaignMetrics.audienceResolveDuration.startTimer({ audience_type: spec.type, mode: 'members' });
    try {
      if (!(await this.customerModel.hasCustomers(restaurantId))) {
        return [];
      }

      const filter = this.compile(spec);
      if (!filter) {
        return [];
      }

      const limit = Math.min(
        options.limit ?? campaignConfig.dispatch.batchSize,
        campaignConfig.dispatch.batchSize
      );
      return await this.customerModel.findMatching(restaurantId, filter, limit, options.afterCustomerId);
    } catch (error) {
      logger.error({ err: error, restaurantId, audienceType: spec.type }, 'Error resolving audience members');
      throw error;
    } finally {
      endTimer();
    }
  }

  /**
   * Count used to refresh a campaign's cached audience size.
   */
  async estimate(restaurantId: string, spec: StoredAudienceSpec): Promise<number> {
    const count = await this.resolveCount(restaurantId, spec);
    logger.debug({ restaurantId, audienceType: spec.type, count }, 'Audience size estimated');
    return count;
  }

  private compile(spec: StoredAudienceSpec) {
    if (spec.type === AudienceType.LOCATION_RADIUS && !locationRadiusNoticeLogged) {
      locationRadiusNoticeLogged = true;
      logger.debug('Location radius audiences are not evaluated yet and resolve to no customers');
    }
    if (spec.type === 'unsupported') {
      logger.warn({ storedType: spec.storedType }, 'Unsupported audience type resolves to no customers');
    }
    return buildAudienceFilter(spec, this.clock());
  }
}
