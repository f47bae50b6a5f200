import { FastifyInstance } from 'fastify';
import { PromoCodeController } from '../controllers/promo-code.controller';
import { tenantMiddleware } from '../middleware/tenant.middleware';
import { validate } from '../middleware/validation.middleware';
import { AppServices } from '../services';
import {
  CreatePromoCodeRequest,
  GeneratePromoCodeRequest,
  ListPromoCodesFilters,
} from '../types/promo-code.types';
import {
  applyPromoCodeSchema,
  createPromoCodeSchema,
  generatePromoCodeSchema,
  listPromoCodesQuerySchema,
  promoCodeIdParamSchema,
  redeemPromoCodeSchema,
  validatePromoCodeSchema,
} from '../validators/promo-code.schemas';
import { paginationQuerySchema } from '../validators/campaign.schemas';

type IdParams = { Params: { id: string } };

export async function promoCodeRoutes(fastify: FastifyInstance, opts: { services: AppServices }) {
  const controller = new PromoCodeController(opts.services.promoCodeService);
  const withId = validate({ params: promoCodeIdParamSchema });

  fastify.post<{ Body: CreatePromoCodeRequest }>(
    '/promo-codes',
    { preHandler: [tenantMiddleware, validate({ body: createPromoCodeSchema })] },
    async (request, reply) => controller.createPromoCode(request, reply)
  );

  fastify.post<{ Body: GeneratePromoCodeRequest }>(
    '/promo-codes/generate',
    { preHandler: [tenantMiddleware, validate({ body: generatePromoCodeSchema })] },
    async (request, reply) => controller.generatePromoCode(request, reply)
  );

  fastify.get<{ Querystring: ListPromoCodesFilters }>(
    '/promo-codes',
    { preHandler: [tenantMiddleware, validate({ query: listPromoCodesQuerySchema })] },
    async (request, reply) => controller.listPromoCodes(request, reply)
  );

  fastify.get<IdParams>(
    '/promo-codes/:id',
    { preHandler: [tenantMiddleware, withId] },
    async (request, reply) => controller.getPromoCode(request, reply)
  );

  fastify.post<IdParams>(
    '/promo-codes/:id/deactivate',
    { preHandler: [tenantMiddleware, withId] },
    async (request, reply) => controller.deactivatePromoCode(request, reply)
  );

  fastify.get<IdParams & { Querystring: { limit?: number; offset?: number } }>(
    '/promo-codes/:id/redemptions',
    { preHandler: [tenantMiddleware, validate({ params: promoCodeIdParamSchema, query: paginationQuerySchema })] },
    async (request, reply) => controller.listRedemptions(request, reply)
  );

  fastify.get<IdParams>(
    '/promo-codes/:id/consistency',
    { preHandler: [tenantMiddleware, withId] },
    async (request, reply) => controller.checkUsageConsistency(request, reply)
  );

  // Checkout
  fastify.post<{ Body: { customerId: string; code: string; orderAmountCents: number } }>(
    '/promo-codes/validate',
    { preHandler: [tenantMiddleware, validate({ body: validatePromoCodeSchema })] },
    async (request, reply) => controller.validatePromoCode(request, reply)
  );

  fastify.post<{
    Body: {
      promoCodeId: string;
      customerId: string;
      orderAmountCents: number;
      discountAppliedCents: number;
      orderId?: string | null;
    };
  }>(
    '/promo-codes/redeem',
    {
      preHandler: [tenantMiddleware, validate({ body: redeemPromoCodeSchema })],
      config: {
        rateLimit: {
          max: 60,
          timeWindow: '1 minute',
        },
      },
    },
    async (request, reply) => controller.redeemPromoCode(request, reply)
  );

  fastify.post<{ Body: { customerId: string; code: string; orderAmountCents: number; orderId?: string | null } }>(
    '/promo-codes/apply',
    {
      preHandler: [tenantMiddleware, validate({ body: applyPromoCodeSchema })],
      config: {
        rateLimit: {
          max: 60,
          timeWindow: '1 minute',
        },
      },
    },
    async (request, reply) => controller.applyPromoCode(request, reply)
  );
}
