import type { FastifyInstance } from 'fastify';
import type { TransportKind } from '../audit/transport.js';

export interface HealthRoutesOptions {
  checkDatabase: () => Promise<boolean>;
  inference: { transport: TransportKind; endpointUrl: string };
}

export default async function healthRoutes(app: FastifyInstance, opts: HealthRoutesOptions) {
  // GET /api/health: check service health
  app.get(
    '/api/health',
    {
      schema: {
        tags: ['Admin'],
        summary: 'Health check',
        description: 'Returns service health including MySQL connectivity and the configured inference endpoint.',
        response: {
          200: {
            description: 'Health status',
            type: 'object',
            properties: {
              status: { type: 'string' },
              services: {
                type: 'object',
                properties: {
                  mysql: { type: 'string', enum: ['up', 'down'] },
                },
              },
              inference: {
                type: 'object',
                properties: {
                  transport: { type: 'string' },
                  endpointUrl: { type: 'string' },
                },
              },
            },
          },
        },
      },
    },
    async (request, reply) => {
      let mysql: 'up' | 'down' = 'down';
      try {
        mysql = (await opts.checkDatabase()) ? 'up' : 'down';
      } catch (err) {
        request.log.warn({ err }, 'Database health check failed');
      }

      return reply.send({ status: 'ok', services: { mysql }, inference: opts.inference });
    },
  );
}
