export { type Env, type AppConfig, ConfigError, parseEnv, toAppConfig, loadConfig } from './env.js';

export {
  type ScoringPolicy,
  type ScoringWeights,
  type ScoringCredits,
  type SizeBounds,
  type LoadedScoringPolicy,
  ScoringPolicyError,
  DEFAULT_SCORING_POLICY_PATH,
  getDefaultScoringPolicy,
  parseScoringPolicy,
  loadScoringPolicy,
} from './scoring-policy.js';
