/**
 * @gitbrief/core - Shared types, errors, configuration, logging, git and LLM call helpers.
 * This is the foundation package that all other gitbrief packages depend on.
 */

// Types
export * from './types.js';

// Errors
export * from './errors.js';

// Config
export {
  CONFIG_FILENAME,
  DEFAULT_NOISE_SUFFIXES,
  DEFAULT_NOISE_DIRECTORIES,
  DEFAULT_NOISE_BASENAMES,
  DEFAULT_PROVIDER_SETTINGS,
  loadConfig,
  parseConfig,
  saveConfig,
  normalizeKeys,
  getDefaultConfig,
  writeDefaultConfig,
  resolveProject,
  deriveAlias,
  projectDataDir,
  type GitBriefConfig,
  type ProjectEntry,
  type ScheduleEntry,
  type ProviderSettings,
} from './config.js';

// Logger
export {
  Logger,
  initLogger,
  getLogger,
  formatLogLine,
  type LogEntry,
  type LogLevel,
  type LoggerOptions,
} from './logger.js';

// LLM
export {
  UsageTracker,
  classifyProviderError,
  estimateTokens,
  isTransientError,
  withRetry,
  withTimeout,
  type RetryOptions,
} from './llm.js';

// Git
export {
  createGitClient,
  isGitRepo,
  getCommitLog,
  getCommitDiff,
  parseNumstatLog,
  resolveRenamedPath,
  splitDiffByFile,
  windowArgs,
  type DiffSection,
} from './git.js';

// Utils
export {
  generateId,
  now,
  readFileSafe,
  atomicWrite,
  sleep,
  formatDate,
  formatDateTime,
  dateStamp,
  timestampStamp,
  isRemoteLocation,
} from './utils.js';
