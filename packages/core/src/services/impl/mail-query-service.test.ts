import { describe, it, expect } from 'vitest';
import { getDefaultScoringPolicy } from '@invoice-intake/config';
import { authError } from '@invoice-intake/utils';
import { FakeMailService } from '../../test/fakes.js';
import type { MailMessage } from '../../types/mail.js';
import { AttachmentScorerService } from './scorer-service.js';
import { MailQueryService, prepareMessages, toSearchQuery } from './mail-query-service.js';

const NOW = new Date('2024-06-01T09:00:00Z');
const options = { searchTop: 10, defaultDaysBack: 7 };

const message = (id: string, attachmentCount: number): MailMessage => ({
  id,
  subject: `Invoice ${id}`,
  senderAddress: 'ap@vendor.test',
  receivedAt: NOW,
  attachments: Array.from({ length: attachmentCount }, (_, i) => ({
    id: `${id}-att-${i}`,
    name: `invoice-${id}-${i}.pdf`,
    contentType: 'application/pdf',
    sizeBytes: 10_000,
  })),
});

describe('toSearchQuery', () => {
  it('normalizes the criteria for the mail service', () => {
    expect(
      toSearchQuery({ senderEmail: 'from:AP@Vendor.test', subjectContains: '  invoice ', daysBack: 14 }, options)
    ).toEqual({ daysBack: 14, top: 10, senderEmail: 'ap@vendor.test', subjectContains: 'invoice' });
  });

  it('omits blank criteria and defaults the window', () => {
    expect(toSearchQuery({ senderEmail: '  ', daysBack: -3 }, options)).toEqual({ daysBack: 7, top: 10 });
  });
});

describe('prepareMessages', () => {
  it('drops duplicates and messages without attachments', () => {
    const prepared = prepareMessages([message('a', 1), message('b', 0), message('a', 2), message('c', 1)]);
    expect(prepared.map((m) => [m.id, m.attachments.length])).toEqual([
      ['a', 1],
      ['c', 1],
    ]);
  });
});

describe('MailQueryService', () => {
  const scorer = new AttachmentScorerService(getDefaultScoringPolicy(), { now: () => NOW });

  it('searches and scores the returned messages', async () => {
    const mail = new FakeMailService([message('m1', 2), message('m2', 0)]);
    const service = new MailQueryService(mail, scorer, options);

    const result = await service.findCandidates({ subjectContains: 'invoice' });

    expect(mail.queries).toEqual([{ daysBack: 7, top: 10, subjectContains: 'invoice' }]);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.totalCandidates).toBe(2);
      expect(result.value.recommended?.attachmentId).toBe('m1-att-0');
    }
  });

  it('maps search failures to SEARCH_FAILED with the failure kind', async () => {
    const mail = new FakeMailService();
    mail.searchFailure = authError('mail-service', 401, 'mail-service rejected credentials (401)');
    const service = new MailQueryService(mail, scorer, options);

    const result = await service.findCandidates({});

    expect(result).toEqual({
      ok: false,
      error: {
        code: 'SEARCH_FAILED',
        message: 'mail-service rejected credentials (401)',
        kind: 'auth',
        details: { service: 'mail-service', statusCode: 401 },
      },
    });
  });
});
