import type { FastifyPluginAsync } from 'fastify';
import { createLogger, withTiming } from '@invoice-intake/utils';
import type { IAttachmentPipeline } from '@invoice-intake/core';
import { runBodySchema } from './schemas.js';
import { sendPipelineError } from './errors.js';

const logger = createLogger({ service: 'pipeline-routes' });

export interface PipelineRoutesOptions {
  pipeline: IAttachmentPipeline;
}

export const pipelineRoutes: FastifyPluginAsync<PipelineRoutesOptions> = async (app, opts) => {
  app.post(
    '/run',
    {
      schema: {
        tags: ['pipeline'],
        summary: 'Process every invoice-like attachment matching the criteria',
      },
    },
    async (request, reply) => {
      const { extensions, ...criteria } = runBodySchema.parse(request.body ?? {});

      const result = await withTiming(logger, 'pipeline.run', () =>
        opts.pipeline.processAll(criteria, extensions ? { extensions } : {})
      );
      return result.ok ? result.value : sendPipelineError(reply, result.error);
    }
  );
};
