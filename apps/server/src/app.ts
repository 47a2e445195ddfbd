import { randomUUID } from 'node:crypto';
import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import sensible from '@fastify/sensible';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { ZodError } from 'zod';
import { buildLoggerOptions, createLogger, type Result } from '@invoice-intake/utils';
import type { AppConfig } from '@invoice-intake/config';
import type { AttachmentRecordStore, AuditTrail, IAttachmentPipeline, InvoiceStore } from '@invoice-intake/core';
import { healthRoutes } from './routes/health.js';
import { attachmentRoutes } from './routes/attachments.js';
import { pipelineRoutes } from './routes/pipeline.js';
import { invoiceRoutes } from './routes/invoices.js';
import { auditRoutes } from './routes/audit.js';

const logger = createLogger({ service: 'app' });

export interface AppServices {
  pipeline: IAttachmentPipeline;
  attachmentRecords: AttachmentRecordStore;
  invoices: InvoiceStore;
  audit: AuditTrail;
  pingDatabase?: () => Promise<Result<void, Error>>;
}

export interface AppOptions {
  /** Default number of candidates a search returns. */
  maxCandidates: number;
}

export async function buildApp(
  services: AppServices,
  config: AppConfig,
  options: AppOptions
): Promise<FastifyInstance> {
  const production = config.nodeEnv === 'production';

  const app = Fastify({
    logger: buildLoggerOptions({
      level: config.logging.level,
      serviceName: config.logging.serviceName,
      version: config.logging.version,
      pretty: config.nodeEnv === 'development',
    }),
    requestIdHeader: 'x-request-id',
    genReqId: () => randomUUID(),
  });

  // Security plugins
  await app.register(helmet, {
    contentSecurityPolicy: production,
  });

  await app.register(cors, {
    origin: !production,
    credentials: true,
  });

  await app.register(rateLimit, {
    max: 100,
    timeWindow: '1 minute',
  });

  // Utility plugin
  await app.register(sensible);

  // Route plugins only inherit an error handler set before they register
  app.setErrorHandler((error, request, reply) => {
    if (error instanceof ZodError) {
      return reply.status(400).send({
        error: 'Validation Error',
        message: 'Invalid request parameters',
        details: error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
      });
    }

    if (error.validation) {
      return reply.status(400).send({
        error: 'Validation Error',
        message: 'Invalid request parameters',
        details: error.validation,
      });
    }

    logger.error({ error, requestId: request.id }, 'Request error');

    const statusCode = error.statusCode ?? 500;
    return reply.status(statusCode).send({
      error: error.name,
      message: production && statusCode >= 500 ? 'An error occurred' : error.message,
    });
  });

  // API documentation
  await app.register(swagger, {
    openapi: {
      openapi: '3.0.0',
      info: {
        title: 'Invoice Intake API',
        description: 'Finds invoice attachments in a mailbox, extracts their fields and stores them',
        version: config.logging.version,
      },
      servers: [
        {
          url: `http://${config.server.host}:${config.server.port}`,
          description: 'Local server',
        },
      ],
      tags: [
        { name: 'health', description: 'Health check endpoints' },
        { name: 'attachments', description: 'Attachment search and processing' },
        { name: 'pipeline', description: 'Batch processing' },
        { name: 'invoices', description: 'Stored invoices' },
        { name: 'audit', description: 'Audit trail' },
      ],
    },
  });

  await app.register(swaggerUi, {
    routePrefix: '/docs',
    uiConfig: {
      docExpansion: 'list',
      deepLinking: false,
    },
  });

  // Register routes
  await app.register(healthRoutes, {
    prefix: '/health',
    version: config.logging.version,
    ...(services.pingDatabase ? { pingDatabase: services.pingDatabase } : {}),
  });
  await app.register(attachmentRoutes, {
    prefix: '/api/attachments',
    pipeline: services.pipeline,
    attachmentRecords: services.attachmentRecords,
    invoices: services.invoices,
    maxCandidates: options.maxCandidates,
  });
  await app.register(pipelineRoutes, { prefix: '/api/pipeline', pipeline: services.pipeline });
  await app.register(invoiceRoutes, { prefix: '/api/invoices', invoices: services.invoices });
  await app.register(auditRoutes, { prefix: '/api/audit', audit: services.audit });

  return app;
}
