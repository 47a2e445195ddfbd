import type { FastifyPluginAsync } from 'fastify';
import { PipelineErrorCode, type InvoiceStore } from '@invoice-intake/core';
import { idParamsSchema, invoiceQuerySchema } from './schemas.js';
import { sendStorageError } from './errors.js';

export interface InvoiceRoutesOptions {
  invoices: InvoiceStore;
}

export const invoiceRoutes: FastifyPluginAsync<InvoiceRoutesOptions> = async (app, opts) => {
  // List invoices
  app.get(
    '/',
    {
      schema: {
        tags: ['invoices'],
        summary: 'List stored invoices',
      },
    },
    async (request, reply) => {
      const query = invoiceQuerySchema.parse(request.query);

      const result = await opts.invoices.list(query);
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

  // Get invoice by ID
  app.get(
    '/:id',
    {
      schema: {
        tags: ['invoices'],
        summary: 'Get an invoice by ID',
      },
    },
    async (request, reply) => {
      const { id } = idParamsSchema.parse(request.params);

      const result = await opts.invoices.findById(id);
      if (!result.ok) {
        return sendStorageError(reply, result.error);
      }
      if (!result.value) {
        return reply.status(404).send({ error: PipelineErrorCode.NOT_FOUND, message: 'Invoice not found' });
      }
      return result.value;
    }
  );
};
