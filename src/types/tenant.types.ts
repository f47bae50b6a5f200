import 'fastify';

export interface TenantContext {
  restaurantId: string;
  actorId: string;
}

declare module 'fastify' {
  interface FastifyRequest {
    tenant: TenantContext | null;
  }
}
