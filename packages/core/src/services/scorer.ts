import type { MailMessage, ScoringResult, SearchCriteria } from '../types/mail.js';

// Candidate scorer interface
export interface IAttachmentScorer {
  /**
   * Rank every (message, attachment) pair against the criteria.
   * Pure apart from the injected clock; never throws on missing message fields.
   */
  score(messages: readonly MailMessage[], criteria: SearchCriteria): ScoringResult;
}

export interface ScorerOptions {
  now?: () => Date;
}
