import { FastifyReply, FastifyRequest } from 'fastify';
import { PromoCodeService } from '../services/promo-code.service';
import { tenantOf } from '../middleware/tenant.middleware';
import {
  CreatePromoCodeRequest,
  GeneratePromoCodeRequest,
  ListPromoCodesFilters,
} from '../types/promo-code.types';

type PromoCodeParams = { Params: { id: string } };

type ValidateBody = { customerId: string; code: string; orderAmountCents: number };
type ApplyBody = ValidateBody & { orderId?: string | null };
type RedeemBody = {
  promoCodeId: string;
  customerId: string;
  orderAmountCents: number;
  discountAppliedCents: number;
  orderId?: string | null;
};

export class PromoCodeController {
  constructor(private promoCodeService: PromoCodeService) {}

  async createPromoCode(request: FastifyRequest<{ Body: CreatePromoCodeRequest }>, reply: FastifyReply) {
    const { restaurantId } = tenantOf(request);
    reply.status(201).send(await this.promoCodeService.createPromoCode(restaurantId, request.body));
  }

  async generatePromoCode(request: FastifyRequest<{ Body: GeneratePromoCodeRequest }>, reply: FastifyReply) {
    const { restaurantId } = tenantOf(request);
    reply.status(201).send(await this.promoCodeService.generatePromoCode(restaurantId, request.body));
  }

  async listPromoCodes(request: FastifyRequest<{ Querystring: ListPromoCodesFilters }>, reply: FastifyReply) {
    const { restaurantId } = tenantOf(request);
    reply.send({ data: await this.promoCodeService.listPromoCodes(restaurantId, request.query) });
  }

  async getPromoCode(request: FastifyRequest<PromoCodeParams>, reply: FastifyReply) {
    const { restaurantId } = tenantOf(request);
    reply.send(await this.promoCodeService.getPromoCode(restaurantId, request.params.id));
  }

  async deactivatePromoCode(request: FastifyRequest<PromoCodeParams>, reply: FastifyReply) {
    const { restaurantId } = tenantOf(request);
    reply.send(await this.promoCodeService.deactivatePromoCode(restaurantId, request.params.id));
  }

  async listRedemptions(
    request: FastifyRequest<PromoCodeParams & { Querystring: { limit?: number; offset?: number } }>,
    reply: FastifyReply
  ) {
    const { restaurantId } = tenantOf(request);
    const redemptions = await this.promoCodeService.listRedemptions(
      restaurantId,
      request.params.id,
      request.query.limit,
      request.query.offset
    );
    reply.send({ data: redemptions });
  }

  async checkUsageConsistency(request: FastifyRequest<PromoCodeParams>, reply: FastifyReply) {
    const { restaurantId } = tenantOf(request);
    reply.send(await this.promoCodeService.checkUsageConsistency(restaurantId, request.params.id));
  }

  /**
   * Read-only check. A rejection is a normal 200 answer with `valid: false`.
   */
  async validatePromoCode(request: FastifyRequest<{ Body: ValidateBody }>, reply: FastifyReply) {
    const { restaurantId } = tenantOf(request);
    const { customerId, code, orderAmountCents } = request.body;
    reply.send(await this.promoCodeService.validate(restaurantId, customerId, code, orderAmountCents));
  }

  async redeemPromoCode(request: FastifyRequest<{ Body: RedeemBody }>, reply: FastifyReply) {
    const { restaurantId } = tenantOf(request);
    const redemption = await this.promoCodeService.redeem({ ...request.body, restaurantId });
    reply.status(201).send(redemption);
  }

  async applyPromoCode(request: FastifyRequest<{ Body: ApplyBody }>, reply: FastifyReply) {
    const { restaurantId } = tenantOf(request);
    const { customerId, code, orderAmountCents, orderId } = request.body;
    const result = await this.promoCodeService.validateAndRedeem(
      restaurantId,
      customerId,
      code,
      orderAmountCents,
      orderId
    );
    reply.status(201).send(result);
  }
}
