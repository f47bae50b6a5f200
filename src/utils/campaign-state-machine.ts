/**
 * Campaign State Machine
 * Enforces valid campaign lifecycle transitions
 */

import { CampaignStatus } from '../types/campaign.types';
import { InvalidStatusTransitionError } from '../errors/domain-errors';

export class CampaignStateMachine {
  /**
   * Key = current status, Value = statuses reachable from it
   */
  private static readonly transitions: Record<CampaignStatus, CampaignStatus[]> = {
    [CampaignStatus.DRAFT]: [
      CampaignStatus.SCHEDULED,
      CampaignStatus.CANCELLED,
    ],
    [CampaignStatus.SCHEDULED]: [
      CampaignStatus.SENDING,
      CampaignStatus.CANCELLED,
    ],
    [CampaignStatus.SENDING]: [
      CampaignStatus.SENT,
      CampaignStatus.PAUSED,
      CampaignStatus.CANCELLED,
    ],
    [CampaignStatus.PAUSED]: [
      CampaignStatus.SENDING,
      CampaignStatus.CANCELLED,
    ],
    [CampaignStatus.SENT]: [],
    [CampaignStatus.CANCELLED]: [],
  };

  static canTransition(from: CampaignStatus, to: CampaignStatus): boolean {
    return this.transitions[from].includes(to);
  }

  /**
   * Validate state transition (throws if invalid)
   */
  static validateTransition(from: CampaignStatus, to: CampaignStatus): void {
    if (!this.canTransition(from, to)) {
      throw new InvalidStatusTransitionError('campaign', from, to);
    }
  }

  static getAllowedTransitions(from: CampaignStatus): CampaignStatus[] {
    return [...this.transitions[from]];
  }

  static isTerminalState(status: CampaignStatus): boolean {
    return this.transitions[status].length === 0;
  }
}
