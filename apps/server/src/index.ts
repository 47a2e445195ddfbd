import { createLogger, toError, tryCatchAsync } from '@invoice-intake/utils';
import { loadConfig, loadScoringPolicy } from '@invoice-intake/config';
import {
  MailQueryService,
  createAttachmentPipeline,
  createAttachmentScorer,
  createInvoiceExtractor,
  createInvoiceStorageService,
} from '@invoice-intake/core';
import { createDocumentReader, createGroqClient, createMailServiceClient } from '@invoice-intake/integrations';
import {
  AttachmentRepository,
  AuditRepository,
  InvoiceRepository,
  createDatabase,
  sql,
} from '@invoice-intake/database';
import { buildApp } from './app.js';

const logger = createLogger({ service: 'server' });

async function main(): Promise<void> {
  const config = loadConfig();
  const { policy, source } = loadScoringPolicy(config.processing.scoringPolicyPath);
  logger.info({ source: source ?? 'defaults', version: policy.version }, 'Scoring policy loaded');

  const { db, close: closeDb } = createDatabase(config.databaseUrl);
  const attachmentRecords = new AttachmentRepository(db);
  const invoices = new InvoiceRepository(db);
  const audit = new AuditRepository(db);

  const mail = createMailServiceClient(config.mail);
  const llm = createGroqClient(config.llm);
  if (!llm) {
    logger.warn('GROQ_API_KEY is not set; invoices are extracted with patterns only');
  }

  const pipeline = createAttachmentPipeline(
    {
      mailQuery: new MailQueryService(mail, createAttachmentScorer(policy), {
        searchTop: config.mail.searchTop,
        defaultDaysBack: policy.defaultDaysBack,
      }),
      mail,
      reader: createDocumentReader(),
      extractor: createInvoiceExtractor(llm, {
        maxInvoicesPerAttachment: config.processing.maxInvoicesPerAttachment,
      }),
      storage: createInvoiceStorageService(attachmentRecords, invoices, audit, {
        maxInvoicesPerAttachment: config.processing.maxInvoicesPerAttachment,
        source: config.processing.source,
      }),
      attachmentRecords,
    },
    { confidenceThreshold: policy.confidenceThreshold }
  );

  const app = await buildApp(
    {
      pipeline,
      attachmentRecords,
      invoices,
      audit,
      pingDatabase: () =>
        tryCatchAsync(async () => {
          await db.execute(sql`select 1`);
        }, toError),
    },
    config,
    { maxCandidates: policy.maxCandidates }
  );

  // Graceful shutdown
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');
    await app.close();
    await closeDb();
  };

  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
  for (const signal of signals) {
    process.once(signal, () => {
      shutdown(signal).then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error({ error }, 'Shutdown failed');
          process.exit(1);
        }
      );
    });
  }

  await app.listen({
    host: config.server.host,
    port: config.server.port,
  });
  logger.info({ host: config.server.host, port: config.server.port }, 'Server started');
}

main().catch((error: unknown) => {
  logger.fatal({ error }, 'Failed to start server');
  process.exit(1);
});
