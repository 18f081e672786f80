/**
 * Configuration Module
 */

export {
  type AdvisorConfig,
  type ResolvedAdvisorConfig,
  HARD_TURN_CAP,
  DEFAULT_ADVISOR_CONFIG,
  sanitizeConfig,
  loadEnvConfig,
  loadAdvisorConfig,
  getConfigPath,
  clearConfigCache,
} from './advisor-config';
