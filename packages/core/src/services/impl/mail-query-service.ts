import { type Result, ok, err, createLogger } from '@invoice-intake/utils';
import type { MailMessage, ScoringResult, SearchCriteria } from '../../types/mail.js';
import type { MailSearchQuery, MailServicePort } from '../mail.js';
import type { IAttachmentScorer } from '../scorer.js';
import { PipelineErrorCode, type IMailQueryService, type PipelineError } from '../pipeline.js';
import { normalizeSenderTarget } from './scorer-service.js';

const logger = createLogger({ service: 'mail-query-service' });

export interface MailQueryOptions {
  searchTop: number;
  defaultDaysBack: number;
}

export function toSearchQuery(criteria: SearchCriteria, options: MailQueryOptions): MailSearchQuery {
  const daysBack =
    typeof criteria.daysBack === 'number' && criteria.daysBack > 0 ? criteria.daysBack : options.defaultDaysBack;
  const query: MailSearchQuery = { daysBack, top: options.searchTop };

  const sender = criteria.senderEmail ? normalizeSenderTarget(criteria.senderEmail) : '';
  if (sender !== '') query.senderEmail = sender;

  const subject = criteria.subjectContains?.trim() ?? '';
  if (subject !== '') query.subjectContains = subject;

  return query;
}

/** Keeps the first occurrence of each message id and drops messages without attachments. */
export function prepareMessages(messages: readonly MailMessage[]): MailMessage[] {
  const seen = new Set<string>();
  const prepared: MailMessage[] = [];
  for (const message of messages) {
    if (seen.has(message.id)) continue;
    seen.add(message.id);
    if (message.attachments.length > 0) prepared.push(message);
  }
  return prepared;
}

/**
 * Searches the mailbox for messages with attachments and ranks them.
 */
export class MailQueryService implements IMailQueryService {
  constructor(
    private readonly mail: MailServicePort,
    private readonly scorer: IAttachmentScorer,
    private readonly options: MailQueryOptions
  ) {}

  async findCandidates(criteria: SearchCriteria): Promise<Result<ScoringResult, PipelineError>> {
    const query = toSearchQuery(criteria, this.options);
    const searchResult = await this.mail.search(query);

    if (!searchResult.ok) {
      const failure = searchResult.error;
      logger.error({ query, kind: failure.kind, error: failure.message }, 'Mailbox search failed');
      return err({
        code: PipelineErrorCode.SEARCH_FAILED,
        message: failure.message,
        kind: failure.kind,
        details: { service: failure.service, statusCode: failure.statusCode },
      });
    }

    const messages = prepareMessages(searchResult.value);
    const result = this.scorer.score(messages, criteria);

    logger.info(
      {
        returned: searchResult.value.length,
        withAttachments: messages.length,
        totalCandidates: result.totalCandidates,
        highConfidence: result.highConfidenceCount,
        topScore: result.recommended?.score ?? null,
      },
      'Mailbox search scored'
    );

    return ok(result);
  }
}
