import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { fileURLToPath } from 'url';
import {
  ScoringPolicyError,
  getDefaultScoringPolicy,
  loadScoringPolicy,
  parseScoringPolicy,
} from './scoring-policy.js';

describe('scoring policy', () => {
  const tempDirs: string[] = [];

  const writePolicy = (content: string): string => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'scoring-policy-'));
    tempDirs.push(dir);
    const file = path.join(dir, 'policy.yaml');
    fs.writeFileSync(file, content);
    return file;
  };

  afterEach(() => {
    for (const dir of tempDirs.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('has the documented defaults', () => {
    const policy = getDefaultScoringPolicy();
    expect(policy.weights).toEqual({
      sender: 1,
      subject: 1,
      recency: 0.5,
      filename: 1,
      contentType: 0.3,
      size: 0.2,
    });
    expect(policy.credits.subjectKeyword).toBe(0.6);
    expect(policy.credits.officeDocument).toBeCloseTo(2 / 3);
    expect(policy.sizeBounds.preferredMaxBytes).toBe(10_000_000);
    expect(policy.defaultDaysBack).toBe(7);
    expect(policy.confidenceThreshold).toBe(0.7);
  });

  it('fills unspecified fields from the defaults', () => {
    const policy = parseScoringPolicy({ weights: { recency: 0 }, confidenceThreshold: 0.5 });
    expect(policy.weights.recency).toBe(0);
    expect(policy.weights.sender).toBe(1);
    expect(policy.confidenceThreshold).toBe(0.5);
  });

  it('rejects credits above one and inverted size bounds', () => {
    expect(() => parseScoringPolicy({ credits: { filenamePartial: 1.5 } })).toThrow(ScoringPolicyError);
    expect(() =>
      parseScoringPolicy({ sizeBounds: { preferredMinBytes: 50, acceptableMinBytes: 100 } })
    ).toThrow('preferred size range must lie inside the acceptable range');
  });

  it('falls back to defaults when the file is missing', () => {
    const loaded = loadScoringPolicy(path.join(os.tmpdir(), 'no-such-dir', 'policy.yaml'));
    expect(loaded.source).toBeNull();
    expect(loaded.policy).toEqual(getDefaultScoringPolicy());
  });

  it('loads a YAML file', () => {
    const file = writePolicy('weights:\n  size: 0.4\ndefaultDaysBack: 14\n');
    const loaded = loadScoringPolicy(file);
    expect(loaded.source).toBe(file);
    expect(loaded.policy.weights.size).toBe(0.4);
    expect(loaded.policy.defaultDaysBack).toBe(14);
  });

  it('reports YAML syntax errors', () => {
    const file = writePolicy('weights: [unclosed\n');
    expect(() => loadScoringPolicy(file)).toThrow(ScoringPolicyError);
  });

  it('ships a repository policy equal to the defaults', () => {
    const loaded = loadScoringPolicy(
      fileURLToPath(new URL('../../../config/scoring-policy.yaml', import.meta.url))
    );
    expect(loaded.source).not.toBeNull();
    expect(loaded.policy).toEqual(getDefaultScoringPolicy());
  });
});
