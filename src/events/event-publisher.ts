import { v4 as uuidv4 } from 'uuid';
import { isRabbitMQConnected, publishEvent } from '../config/rabbitmq';
import { logger } from '../utils/logger';
import { campaignMetrics } from '../utils/metrics';
import { retry } from '../utils/retry';
import { CampaignEvent, CampaignEventPayload, CampaignEvents, EVENT_SCHEMA_VERSION } from './event-types';

/**
 * Publishes lifecycle events for the delivery collaborator. Events are sent
 * after the state change commits, so a failed publish never undoes it.
 * While the broker is down events are dropped at once instead of retried
 * on the request path.
 */
export class EventPublisher {
  constructor(
    private publish: (routingKey: string, data: unknown) => Promise<void> = publishEvent,
    private isConnected: () => boolean = isRabbitMQConnected
  ) {}

  async publishCampaignEvent(type: CampaignEvents, payload: CampaignEventPayload): Promise<void> {
    if (!this.isConnected()) {
      campaignMetrics.campaignEventsSkipped.inc({ event_type: type });
      logger.warn({ eventType: type, campaignId: payload.campaignId }, 'Broker not connected, campaign event skipped');
      return;
    }

    const event: CampaignEvent = {
      version: EVENT_SCHEMA_VERSION,
      id: uuidv4(),
      type,
      aggregateId: payload.campaignId,
      payload,
      timestamp: new Date(),
    };

    try {
      await retry(() => this.publish(type, event), {
        maxAttempts: 3,
        delayMs: 1000,
        backoffMultiplier: 2,
        maxDelayMs: 5000,
      });
      logger.info({ eventType: type, campaignId: payload.campaignId, eventId: event.id }, 'Campaign event published');
    } catch (error) {
      logger.error({ err: error, eventType: type, campaignId: payload.campaignId }, 'All publish attempts failed');
      throw error;
    }
  }
}
