/**
 * YAML configuration loader for .gitbrief.yml files.
 * Handles loading, validation, and default values.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigError } from './errors.js';

export const CONFIG_FILENAME = '.gitbrief.yml';

/** Suffixes that never carry reviewable changes */
export const DEFAULT_NOISE_SUFFIXES = [
  '.lock',
  '.min.js',
  '.min.css',
  '.map',
  '.pyc',
  '.so',
  '.o',
  '.a',
  '.dll',
  '.exe',
  '.class',
  '.jar',
  '.png',
  '.jpg',
  '.jpeg',
  '.gif',
  '.ico',
  '.webp',
  '.svg',
  '.woff',
  '.woff2',
  '.ttf',
  '.eot',
  '.pdf',
  '.zip',
  '.tar.gz',
  '.tgz',
];

/** Directories whose contents are build output, caches or editor state */
export const DEFAULT_NOISE_DIRECTORIES = [
  'node_modules',
  'dist',
  'build',
  'out',
  'coverage',
  '__pycache__',
  '.pytest_cache',
  '.mypy_cache',
  '.ruff_cache',
  '.venv',
  '.vscode',
  '.idea',
  '.next',
];

/** Exact file names treated as noise wherever they appear */
export const DEFAULT_NOISE_BASENAMES = [
  'package-lock.json',
  'npm-shrinkwrap.json',
  'pnpm-lock.yaml',
  'yarn.lock',
  'poetry.lock',
  'pdm.lock',
  'uv.lock',
  'Cargo.lock',
  'go.sum',
  '.env',
  '.DS_Store',
];

const projectSchema = z.object({
  alias: z.string().min(1),
  /** Local repository path or remote URL */
  location: z.string().min(1),
});

const scheduleSchema = z.object({
  cron: z.string(),
  project: z.string(),
  timezone: z.string().default('UTC'),
});

const providerSettingsSchema = z.object({
  model: z.string(),
  apiKeyEnv: z.string().optional(),
  baseUrl: z.string().optional(),
});

export type ProviderSettings = z.infer<typeof providerSettingsSchema>;

/** Model, key variable and endpoint per registered provider */
export const DEFAULT_PROVIDER_SETTINGS: Record<string, ProviderSettings> = {
  anthropic: { model: 'claude-sonnet-4-5', apiKeyEnv: 'ANTHROPIC_API_KEY' },
  openai: { model: 'gpt-4o-mini', apiKeyEnv: 'OPENAI_API_KEY' },
  deepseek: {
    model: 'deepseek-chat',
    apiKeyEnv: 'DEEPSEEK_API_KEY',
    baseUrl: 'https://api.deepseek.com',
  },
  ollama: { model: 'llama3.1', baseUrl: 'http://localhost:11434/v1' },
  gemini: { model: 'gemini-1.5-flash', apiKeyEnv: 'GEMINI_API_KEY' },
  mock: { model: 'mock' },
};

const configSchema = z.object({
  version: z.number().default(1),
  /** Per-project data, logs and reports live under this directory */
  dataDir: z.string().default('.gitbrief'),
  projects: z.array(projectSchema).default([]),
  source: z
    .object({
      since: z.string().default('1 day ago'),
      maxCommits: z.number().int().positive().default(100),
      githubTokenEnv: z.string().default('GITHUB_TOKEN'),
      githubBaseUrl: z.string().optional(),
    })
    .default({}),
  filter: z
    .object({
      suffixes: z.array(z.string()).default(DEFAULT_NOISE_SUFFIXES),
      directories: z.array(z.string()).default(DEFAULT_NOISE_DIRECTORIES),
      basenames: z.array(z.string()).default(DEFAULT_NOISE_BASENAMES),
      excludeBinary: z.boolean().default(true),
    })
    .default({}),
  llm: z
    .object({
      provider: z.string().default('anthropic'),
      style: z.string().default('default'),
      providers: z.record(providerSettingsSchema).default(DEFAULT_PROVIDER_SETTINGS),
      temperature: z.number().min(0).max(2).default(0.4),
      maxTokens: z.number().int().positive().default(4096),
      maxRetries: z.number().int().min(0).default(3),
      retryBaseDelayMs: z.number().int().min(0).default(1000),
      requestTimeoutMs: z.number().int().positive().default(120_000),
      maxDiffChars: z.number().int().positive().default(100_000),
      mapConcurrency: z.number().int().min(1).max(32).default(4),
    })
    .default({}),
  run: z
    .object({
      timeoutMs: z.number().int().positive().default(600_000),
      gracePeriodMs: z.number().int().min(0).default(10_000),
    })
    .default({}),
  memory: z
    .object({
      /** Distil the log after every Nth appended entry; 0 disables automatic distillation */
      distillEvery: z.number().int().min(0).default(1),
      recencyWeight: z.enum(['low', 'medium', 'high']).default('high'),
      magnitudeWeight: z.enum(['low', 'medium', 'high']).default('medium'),
    })
    .default({}),
  report: z
    .object({
      formats: z.array(z.enum(['html', 'markdown', 'text'])).default(['html']),
      outputPrefix: z.string().default('GitReport'),
      title: z.string().default('Git Daily Report'),
    })
    .default({}),
  article: z
    .object({
      enabled: z.boolean().default(false),
      style: z.string().default('default'),
      attachFormat: z.enum(['html', 'pdf']).default('html'),
      pdfCommand: z.string().default('prince'),
      pdfStylesheet: z.string().optional(),
      pdfTimeoutMs: z.number().int().positive().default(60_000),
    })
    .default({}),
  hooks: z
    .object({
      cleanOutput: z.boolean().default(true),
      redactTerms: z.array(z.string()).default([]),
      footer: z.string().optional(),
    })
    .default({}),
  notify: z
    .object({
      channels: z.array(z.string()).default([]),
      recipients: z.array(z.string()).default([]),
      timeoutMs: z.number().int().positive().default(30_000),
      email: z
        .object({
          apiKeyEnv: z.string().default('RESEND_API_KEY'),
          from: z.string().optional(),
        })
        .default({}),
      slack: z
        .object({
          botTokenEnv: z.string().default('SLACK_BOT_TOKEN'),
          channel: z.string().optional(),
        })
        .default({}),
      feishu: z
        .object({
          appIdEnv: z.string().default('FEISHU_APP_ID'),
          appSecretEnv: z.string().default('FEISHU_APP_SECRET'),
          webhookEnv: z.string().default('FEISHU_WEBHOOK_URL'),
          baseUrl: z.string().default('https://open.feishu.cn'),
        })
        .default({}),
    })
    .default({}),
  schedules: z.array(scheduleSchema).default([]),
});

export type GitBriefConfig = z.infer<typeof configSchema>;
export type ProjectEntry = z.infer<typeof projectSchema>;
export type ScheduleEntry = z.infer<typeof scheduleSchema>;

/** Default configuration when no .gitbrief.yml is found */
export function getDefaultConfig(): GitBriefConfig {
  return configSchema.parse({});
}

/** Validate an already-normalised (camelCase) object */
export function parseConfig(raw: unknown): GitBriefConfig {
  const result = configSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new ConfigError(`Invalid ${CONFIG_FILENAME}: ${issues}`);
  }
  return result.data;
}

/**
 * Load and validate a .gitbrief.yml config file.
 * Falls back to defaults if the file doesn't exist.
 */
export function loadConfig(configDir: string): GitBriefConfig {
  const configPath = path.join(configDir, CONFIG_FILENAME);

  if (!fs.existsSync(configPath)) {
    return getDefaultConfig();
  }

  const raw = fs.readFileSync(configPath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = yaml.load(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Could not parse ${configPath}: ${message}`);
  }

  // Convert snake_case YAML keys to camelCase for TS
  return parseConfig(normalizeKeys(parsed));
}

/** Serialise a config back to snake_case YAML */
export function saveConfig(configDir: string, config: GitBriefConfig): string {
  const configPath = path.join(configDir, CONFIG_FILENAME);
  fs.writeFileSync(configPath, yaml.dump(snakeKeys(config), { lineWidth: 100, skipInvalid: true }), 'utf-8');
  return configPath;
}

/** Look up a project alias; unknown aliases are treated as a path or URL */
export function resolveProject(
  config: GitBriefConfig,
  aliasOrLocation: string,
): ProjectEntry {
  const entry = config.projects.find((p) => p.alias === aliasOrLocation);
  if (entry) return entry;
  return { alias: deriveAlias(aliasOrLocation), location: aliasOrLocation };
}

/** `owner-repo` for URLs, the directory name for paths */
export function deriveAlias(location: string): string {
  const trimmed = location.replace(/\.git$/, '').replace(/[\\/]+$/, '');
  const urlMatch = trimmed.match(/[:/]([^/:]+)\/([^/]+)$/);
  if (/^(https?:\/\/|git@)/.test(trimmed) && urlMatch) {
    return `${urlMatch[1]}-${urlMatch[2]}`;
  }
  return path.basename(trimmed) || 'project';
}

/** Directory holding one project's memory files and reports */
export function projectDataDir(config: GitBriefConfig, baseDir: string, alias: string): string {
  return path.resolve(baseDir, config.dataDir, 'projects', alias);
}

/**
 * Write a default .gitbrief.yml config file to the given directory.
 */
export function writeDefaultConfig(configDir: string): string {
  const configPath = path.join(configDir, CONFIG_FILENAME);
  const defaultYaml = `version: 1

# Memory logs, generated reports and run logs
data_dir: .gitbrief

# Project aliases: gitbrief run -p <alias>
projects: []
#  - alias: backend
#    location: ../backend
#  - alias: docs
#    location: https://github.com/acme/docs

# Commit window and remote access
source:
  since: "1 day ago"
  max_commits: 100
  github_token_env: GITHUB_TOKEN

# Files that never reach the language model or the statistics.
# Leave unset to use the built-in lists.
filter:
  exclude_binary: true

# Language model settings. API keys are read from the named env vars.
llm:
  provider: anthropic   # anthropic | openai | deepseek | ollama | gemini | mock
  style: default
  temperature: 0.4
  max_tokens: 4096
  max_retries: 3
  retry_base_delay_ms: 1000
  request_timeout_ms: 120000
  max_diff_chars: 100000
  map_concurrency: 4

run:
  timeout_ms: 600000
  grace_period_ms: 10000

# Long-term memory
memory:
  distill_every: 1          # 0 = only on \`gitbrief distill\`
  recency_weight: high      # low | medium | high
  magnitude_weight: medium

report:
  formats:
    - html
  output_prefix: GitReport
  title: Git Daily Report

# Styled article (optional)
article:
  enabled: false
  style: default
  attach_format: html       # html | pdf (needs the prince binary)
  pdf_command: prince

hooks:
  clean_output: true
  redact_terms: []

# Delivery
notify:
  channels: []              # email | slack | feishu
  recipients: []
  email:
    api_key_env: RESEND_API_KEY
    # from: "Reports <reports@example.com>"
  slack:
    bot_token_env: SLACK_BOT_TOKEN
    # channel: "#dev-reports"
  feishu:
    app_id_env: FEISHU_APP_ID
    app_secret_env: FEISHU_APP_SECRET
    webhook_env: FEISHU_WEBHOOK_URL

# Cron schedules for \`gitbrief schedule\`
schedules: []
#  - cron: "0 18 * * 1-5"
#    project: backend
`;

  fs.writeFileSync(configPath, defaultYaml, 'utf-8');
  return configPath;
}

/** Recursively convert snake_case keys to camelCase */
export function normalizeKeys(obj: unknown): unknown {
  if (Array.isArray(obj)) {
    return obj.map(normalizeKeys);
  }
  if (isRecord(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      const camelKey = key.replace(/_([a-z])/g, (_, c: string) => c.toUpperCase());
      result[camelKey] = normalizeKeys(value);
    }
    return result;
  }
  return obj;
}

function snakeKeys(obj: unknown): unknown {
  if (Array.isArray(obj)) {
    return obj.map(snakeKeys);
  }
  if (isRecord(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key.replace(/[A-Z]/g, (c) => `_${c.toLowerCase()}`)] = snakeKeys(value);
    }
    return result;
  }
  return obj;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}
