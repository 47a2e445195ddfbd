import type { ScoringPolicy } from '@invoice-intake/config';
import type {
  Candidate,
  MailAttachment,
  MailMessage,
  ScoringResult,
  SearchCriteria,
} from '../../types/mail.js';
import type { IAttachmentScorer, ScorerOptions } from '../scorer.js';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export interface SubScore {
  score: number;
  reasons: string[];
}

const isSet = (value: string | null | undefined): value is string =>
  typeof value === 'string' && value.trim() !== '';

const clampUnit = (value: number): number => Math.min(1, Math.max(0, value));

/** Lower-cases the sender criterion and drops a leading `from:` qualifier. */
export function normalizeSenderTarget(raw: string): string {
  const target = raw.trim().toLowerCase();
  return target.startsWith('from:') ? target.slice('from:'.length).trim() : target;
}

/** Accepts either a plain filename or a JSON object carrying a `filename` field. */
export function unwrapFilenameHint(raw: string): string {
  const trimmed = raw.trim();
  if (!(trimmed.startsWith('{') && trimmed.endsWith('}'))) {
    return trimmed;
  }
  try {
    const parsed: unknown = JSON.parse(trimmed);
    if (
      typeof parsed === 'object' &&
      parsed !== null &&
      'filename' in parsed &&
      typeof parsed.filename === 'string' &&
      parsed.filename.trim() !== ''
    ) {
      return parsed.filename.trim();
    }
  } catch {
    // Not JSON after all; the braces are part of the name.
    return trimmed;
  }
  return trimmed;
}

export function effectiveDaysBack(criteria: SearchCriteria, policy: ScoringPolicy): number {
  const days = criteria.daysBack;
  return typeof days === 'number' && Number.isFinite(days) && days > 0 ? days : policy.defaultDaysBack;
}

/** Whole days elapsed since `receivedAt`; future timestamps count as zero. */
export function ageInDays(receivedAt: Date, now: Date): number {
  return Math.max(0, Math.floor((now.getTime() - receivedAt.getTime()) / MS_PER_DAY));
}

const validTimestamp = (value: Date | null | undefined): Date | null =>
  value instanceof Date && !Number.isNaN(value.getTime()) ? value : null;

const extensionOf = (name: string): string | null => {
  const dot = name.lastIndexOf('.');
  return dot >= 0 && dot < name.length - 1 ? name.slice(dot + 1) : null;
};

/**
 * Accumulates weighted sub-scores. Only applicable weights enter the
 * denominator, so an unused criterion neither helps nor hurts.
 */
class WeightedScore {
  private earned = 0;
  private possible = 0;
  readonly reasons: string[] = [];

  apply(weight: number, credit: number, reason?: string): void {
    this.possible += weight;
    this.earned += weight * credit;
    if (reason !== undefined && credit > 0) {
      this.reasons.push(reason);
    }
  }

  note(reason: string): void {
    this.reasons.push(reason);
  }

  result(): SubScore {
    return {
      score: this.possible > 0 ? clampUnit(this.earned / this.possible) : 0,
      reasons: this.reasons,
    };
  }
}

export function scoreMessage(
  message: MailMessage,
  criteria: SearchCriteria,
  policy: ScoringPolicy,
  now: Date
): SubScore {
  const { weights, credits } = policy;
  const acc = new WeightedScore();
  const sender = (message.senderAddress ?? '').toLowerCase();
  const subject = (message.subject ?? '').toLowerCase();

  if (isSet(criteria.senderEmail)) {
    const target = normalizeSenderTarget(criteria.senderEmail);
    if (target !== '' && sender !== '' && sender.includes(target)) {
      acc.apply(weights.sender, 1, `Sender matches: ${message.senderAddress}`);
    } else if (
      target !== '' &&
      sender !== '' &&
      target.split('@').some((part) => part !== '' && sender.includes(part))
    ) {
      acc.apply(weights.sender, credits.senderPartial, `Sender partially matches: ${message.senderAddress}`);
    } else {
      acc.apply(weights.sender, 0);
    }
  }

  if (isSet(criteria.subjectContains)) {
    const target = criteria.subjectContains.trim().toLowerCase();
    const keyword = target
      .split(/\s+/)
      .find((word) => word.length >= policy.subjectKeywordMinLength && subject.includes(word));
    if (subject !== '' && subject.includes(target)) {
      acc.apply(weights.subject, 1, `Subject contains: '${criteria.subjectContains.trim()}'`);
    } else if (subject !== '' && keyword !== undefined) {
      acc.apply(weights.subject, credits.subjectKeyword, `Subject shares keyword: '${keyword}'`);
    } else {
      acc.apply(weights.subject, 0);
    }
  }

  const receivedAt = validTimestamp(message.receivedAt);
  if (receivedAt) {
    const daysBack = effectiveDaysBack(criteria, policy);
    const age = ageInDays(receivedAt, now);
    acc.apply(weights.recency, age > daysBack ? 0 : 1 - age / daysBack);
    acc.note(`Received: ${receivedAt.toISOString()}`);
  }

  return acc.result();
}

export function scoreAttachment(
  attachment: MailAttachment,
  criteria: SearchCriteria,
  policy: ScoringPolicy
): SubScore {
  const { weights, credits, sizeBounds } = policy;
  const acc = new WeightedScore();
  const displayName = attachment.name ?? '';
  const name = displayName.toLowerCase();

  if (isSet(criteria.attachmentNameHint)) {
    const target = unwrapFilenameHint(criteria.attachmentNameHint).toLowerCase();
    const targetExt = extensionOf(target);
    const nameExt = extensionOf(name);
    if (target !== '' && name !== '' && target === name) {
      acc.apply(weights.filename, 1, `Filename matches: ${displayName}`);
    } else if (target !== '' && name !== '' && (name.includes(target) || target.includes(name))) {
      acc.apply(weights.filename, credits.filenamePartial, `Filename partially matches: ${displayName}`);
    } else if (targetExt !== null && nameExt !== null && targetExt === nameExt) {
      acc.apply(weights.filename, credits.filenameExtension, `Filename extension matches: .${nameExt}`);
    } else {
      acc.apply(weights.filename, 0);
    }
  }

  const contentType = (attachment.contentType ?? '').toLowerCase();
  let typeCredit = 0;
  if (contentType.includes('pdf')) {
    typeCredit = 1;
  } else if (['word', 'excel', 'document'].some((kind) => contentType.includes(kind))) {
    typeCredit = credits.officeDocument;
  } else if (contentType.includes('image')) {
    typeCredit = credits.image;
  }
  acc.apply(weights.contentType, typeCredit, `File type: ${attachment.contentType}`);

  const size = Number.isFinite(attachment.sizeBytes) ? attachment.sizeBytes : 0;
  let sizeCredit = 0;
  if (size >= sizeBounds.preferredMinBytes && size <= sizeBounds.preferredMaxBytes) {
    sizeCredit = 1;
  } else if (size >= sizeBounds.acceptableMinBytes && size <= sizeBounds.acceptableMaxBytes) {
    sizeCredit = credits.sizeAcceptable;
  }
  acc.apply(weights.size, sizeCredit, `Plausible size: ${size} bytes`);

  return acc.result();
}

/**
 * Ranks (message, attachment) pairs against search criteria using the
 * weights and partial-match credits of a scoring policy.
 */
export class AttachmentScorerService implements IAttachmentScorer {
  private readonly now: () => Date;

  constructor(
    private readonly policy: ScoringPolicy,
    options: ScorerOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  score(messages: readonly MailMessage[], criteria: SearchCriteria): ScoringResult {
    const now = this.now();
    const candidates: Candidate[] = [];

    for (const message of messages) {
      const attachments = message.attachments ?? [];
      if (attachments.length === 0) continue;

      const messageScore = scoreMessage(message, criteria, this.policy, now);
      for (const attachment of attachments) {
        const attachmentScore = scoreAttachment(attachment, criteria, this.policy);
        candidates.push({
          messageId: message.id,
          attachmentId: attachment.id,
          attachmentName: attachment.name ?? '',
          messageSubject: message.subject ?? '',
          senderAddress: message.senderAddress ?? '',
          receivedAt: validTimestamp(message.receivedAt),
          sizeBytes: attachment.sizeBytes,
          contentType: attachment.contentType ?? '',
          score: clampUnit((messageScore.score + attachmentScore.score) / 2),
          reasons: [...messageScore.reasons, ...attachmentScore.reasons],
        });
      }
    }

    // Array.prototype.sort is stable, so ties keep enumeration order
    candidates.sort((a, b) => b.score - a.score);

    return {
      candidates,
      recommended: candidates[0] ?? null,
      totalCandidates: candidates.length,
      highConfidenceCount: candidates.filter((c) => c.score >= this.policy.confidenceThreshold).length,
    };
  }
}

export function createAttachmentScorer(policy: ScoringPolicy, options?: ScorerOptions): AttachmentScorerService {
  return new AttachmentScorerService(policy, options);
}
