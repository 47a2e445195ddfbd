import { z } from 'zod';
import * as fs from 'fs';
import * as path from 'path';
import { parse as parseYaml } from 'yaml';

const credit = z.number().min(0).max(1);
const weight = z.number().min(0);

// Maximum contribution of each sub-score
const weightsSchema = z.object({
  sender: weight.default(1),
  subject: weight.default(1),
  recency: weight.default(0.5),
  filename: weight.default(1),
  contentType: weight.default(0.3),
  size: weight.default(0.2),
});

// Fractions of a weight awarded for partial matches
const creditsSchema = z.object({
  senderPartial: credit.default(0.5),
  subjectKeyword: credit.default(0.6),
  filenamePartial: credit.default(0.8),
  filenameExtension: credit.default(0.3),
  officeDocument: credit.default(2 / 3),
  image: credit.default(1 / 3),
  sizeAcceptable: credit.default(0.5),
});

const sizeBoundsSchema = z
  .object({
    preferredMinBytes: z.number().int().min(0).default(1_000),
    preferredMaxBytes: z.number().int().min(0).default(10_000_000),
    acceptableMinBytes: z.number().int().min(0).default(100),
    acceptableMaxBytes: z.number().int().min(0).default(50_000_000),
  })
  .refine(
    (b) =>
      b.acceptableMinBytes <= b.preferredMinBytes &&
      b.preferredMinBytes <= b.preferredMaxBytes &&
      b.preferredMaxBytes <= b.acceptableMaxBytes,
    { message: 'preferred size range must lie inside the acceptable range' }
  );

const scoringPolicySchema = z.object({
  version: z.string().default('1.0'),
  weights: weightsSchema.default({}),
  credits: creditsSchema.default({}),
  sizeBounds: sizeBoundsSchema.default({}),
  subjectKeywordMinLength: z.number().int().min(1).default(3),
  defaultDaysBack: z.number().int().positive().default(7),
  confidenceThreshold: credit.default(0.7),
  /** Scoring passes return at most this many candidates to API callers. */
  maxCandidates: z.number().int().positive().default(5),
});

export type ScoringWeights = z.infer<typeof weightsSchema>;
export type ScoringCredits = z.infer<typeof creditsSchema>;
export type SizeBounds = z.infer<typeof sizeBoundsSchema>;
export type ScoringPolicy = z.infer<typeof scoringPolicySchema>;

export class ScoringPolicyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ScoringPolicyError';
  }
}

export function getDefaultScoringPolicy(): ScoringPolicy {
  return scoringPolicySchema.parse({});
}

export function parseScoringPolicy(input: unknown): ScoringPolicy {
  const result = scoringPolicySchema.safeParse(input ?? {});
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ScoringPolicyError(`Invalid scoring policy: ${details}`);
  }
  return result.data;
}

export const DEFAULT_SCORING_POLICY_PATH = path.join('config', 'scoring-policy.yaml');

export interface LoadedScoringPolicy {
  policy: ScoringPolicy;
  /** File the policy came from, or null when the built-in defaults apply. */
  source: string | null;
}

/**
 * Reads the scoring policy YAML. A missing file yields the defaults; a file
 * that exists but fails validation is an error.
 */
export function loadScoringPolicy(configPath?: string): LoadedScoringPolicy {
  const policyPath = path.resolve(process.cwd(), configPath ?? DEFAULT_SCORING_POLICY_PATH);

  if (!fs.existsSync(policyPath)) {
    return { policy: getDefaultScoringPolicy(), source: null };
  }

  const fileContent = fs.readFileSync(policyPath, 'utf-8');
  let document: unknown;
  try {
    document = parseYaml(fileContent);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ScoringPolicyError(`Scoring policy at ${policyPath} is not valid YAML: ${reason}`);
  }

  return { policy: parseScoringPolicy(document), source: policyPath };
}
