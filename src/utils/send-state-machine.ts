import { SendStatus } from '../types/campaign-send.types';
import { InvalidStatusTransitionError } from '../errors/domain-errors';

/**
 * Per-recipient delivery status transitions reported by the delivery collaborator.
 * A sent message can still be confirmed delivered or come back as a failure/bounce.
 * Providers that only report delivery move a pending send straight to delivered.
 */
const SEND_TRANSITIONS: Record<SendStatus, SendStatus[]> = {
  [SendStatus.PENDING]: [SendStatus.SENT, SendStatus.DELIVERED, SendStatus.FAILED, SendStatus.BOUNCED],
  [SendStatus.SENT]: [SendStatus.DELIVERED, SendStatus.FAILED, SendStatus.BOUNCED],
  [SendStatus.DELIVERED]: [],
  [SendStatus.FAILED]: [],
  [SendStatus.BOUNCED]: [],
};

export function canTransitionSend(from: SendStatus, to: SendStatus): boolean {
  return SEND_TRANSITIONS[from].includes(to);
}

export function validateSendTransition(from: SendStatus, to: SendStatus): void {
  if (!canTransitionSend(from, to)) {
    throw new InvalidStatusTransitionError('send', from, to);
  }
}
