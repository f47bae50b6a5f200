import { InvalidStatusTransitionError } from '../../src/errors/domain-errors';
import { CampaignStatus } from '../../src/types/campaign.types';
import { CampaignStateMachine } from '../../src/utils/campaign-state-machine';
import { canTransitionSend, validateSendTransition } from '../../src/utils/send-state-machine';
import { SendStatus } from '../../src/types/campaign-send.types';

describe('CampaignStateMachine', () => {
  it.each([
    [CampaignStatus.DRAFT, CampaignStatus.SCHEDULED],
    [CampaignStatus.DRAFT, CampaignStatus.CANCELLED],
    [CampaignStatus.SCHEDULED, CampaignStatus.SENDING],
    [CampaignStatus.SCHEDULED, CampaignStatus.CANCELLED],
    [CampaignStatus.SENDING, CampaignStatus.SENT],
    [CampaignStatus.SENDING, CampaignStatus.PAUSED],
    [CampaignStatus.SENDING, CampaignStatus.CANCELLED],
    [CampaignStatus.PAUSED, CampaignStatus.SENDING],
    [CampaignStatus.PAUSED, CampaignStatus.CANCELLED],
  ])('allows %s -> %s', (from, to) => {
    expect(() => CampaignStateMachine.validateTransition(from, to)).not.toThrow();
  });

  it.each([
    [CampaignStatus.DRAFT, CampaignStatus.SENDING],
    [CampaignStatus.SCHEDULED, CampaignStatus.PAUSED],
    [CampaignStatus.PAUSED, CampaignStatus.SENT],
    [CampaignStatus.SENT, CampaignStatus.CANCELLED],
    [CampaignStatus.CANCELLED, CampaignStatus.DRAFT],
  ])('rejects %s -> %s', (from, to) => {
    expect(() => CampaignStateMachine.validateTransition(from, to)).toThrow(InvalidStatusTransitionError);
  });

  it('names both ends of a rejected move', () => {
    expect(() => CampaignStateMachine.validateTransition(CampaignStatus.SENT, CampaignStatus.SENDING)).toThrow(
      'Invalid campaign status transition from sent to sending'
    );
  });

  it('treats sent and cancelled as terminal', () => {
    expect(CampaignStateMachine.isTerminalState(CampaignStatus.SENT)).toBe(true);
    expect(CampaignStateMachine.isTerminalState(CampaignStatus.CANCELLED)).toBe(true);
    expect(CampaignStateMachine.isTerminalState(CampaignStatus.PAUSED)).toBe(false);
  });

  it('lists the moves out of sending', () => {
    expect(CampaignStateMachine.getAllowedTransitions(CampaignStatus.SENDING)).toEqual([
      CampaignStatus.SENT,
      CampaignStatus.PAUSED,
      CampaignStatus.CANCELLED,
    ]);
  });
});

describe('send status transitions', () => {
  it('lets a sent message be confirmed or come back', () => {
    expect(canTransitionSend(SendStatus.SENT, SendStatus.DELIVERED)).toBe(true);
    expect(canTransitionSend(SendStatus.SENT, SendStatus.BOUNCED)).toBe(true);
    expect(canTransitionSend(SendStatus.PENDING, SendStatus.FAILED)).toBe(true);
  });

  it('accepts delivery reported without a separate sent event', () => {
    expect(canTransitionSend(SendStatus.PENDING, SendStatus.DELIVERED)).toBe(true);
  });

  it('never moves a send back to pending', () => {
    expect(canTransitionSend(SendStatus.SENT, SendStatus.PENDING)).toBe(false);
  });

  it('keeps final statuses final', () => {
    expect(() => validateSendTransition(SendStatus.DELIVERED, SendStatus.FAILED)).toThrow(
      'Invalid send status transition from delivered to failed'
    );
  });
});
