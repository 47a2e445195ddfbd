import type { FastifyPluginAsync } from 'fastify';
import type { AuditTrail } from '@invoice-intake/core';
import { auditQuerySchema } from './schemas.js';
import { sendStorageError } from './errors.js';

export interface AuditRoutesOptions {
  audit: AuditTrail;
}

export const auditRoutes: FastifyPluginAsync<AuditRoutesOptions> = async (app, opts) => {
  app.get(
    '/',
    {
      schema: {
        tags: ['audit'],
        summary: 'List audit trail entries, newest first',
      },
    },
    async (request, reply) => {
      const query = auditQuerySchema.parse(request.query);

      const result = await opts.audit.list(query);
      if (!result.ok) {
        return sendStorageError(reply, result.error);
      }

      return {
        data: result.value,
        total: result.value.length,
        limit: query.limit,
        offset: query.offset,
      };
    }
  );
};
