import path from 'node:path';
import { config as loadDotenv, type DotenvParseOutput } from 'dotenv';
import { z, type ZodIssue } from 'zod';
import { systemErrorCode } from './shared/errors.js';

const strList = (value: string) =>
  value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);

/**
 * `CHANNEL_DIRS` accepts `name` (directory named after the channel) or
 * `name=path`, comma separated. Relative paths are taken from BASE_DIRECTORY.
 */
export const parseChannelDirs = (value: string): Record<string, string> => {
  const output: Record<string, string> = {};
  for (const entry of strList(value)) {
    const eq = entry.indexOf('=');
    if (eq === -1) {
      output[entry] = entry;
      continue;
    }
    const name = entry.slice(0, eq).trim();
    const dir = entry.slice(eq + 1).trim();
    if (name && dir) {
      output[name] = dir;
    }
  }
  return output;
};

const schemaBase = z.object({
  NODE_ENV: z.string().default('production'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  DATA_DIR: z.string().default('~/.local/share/relaybot'),
  HANDOFF_FILE: z.string().default(''),
  HANDOFF_MAX_RECORDS: z.coerce.number().int().min(0).default(0),
  ATTACHMENTS_DIR: z.string().default(''),
  MAX_ATTACHMENT_BYTES: z.coerce.number().int().min(1).default(10 * 1024 * 1024),

  SLACK_BOT_TOKEN: z.string().default(''),
  SLACK_APP_TOKEN: z.string().default(''),
  SLACK_SIGNING_SECRET: z.string().default(''),
  SLACK_ALLOWED_USERS: z.string().default(''),
  SLACK_ALLOWED_CHANNELS: z.string().default(''),

  BASE_DIRECTORY: z.string().default(''),
  CHANNEL_DIRS: z.string().default(''),

  VERBOSITY: z.enum(['minimal', 'normal', 'verbose']).default('verbose'),
  RATE_LIMIT_PER_MINUTE: z.coerce.number().int().min(1).max(10000).default(10),
  DEDUPE_WINDOW_MS: z.coerce.number().int().min(1000).max(24 * 60 * 60 * 1000).default(10 * 60 * 1000),
  DEDUPE_MAX_ENTRIES: z.coerce.number().int().min(10).max(100000).default(500),
  MAX_MESSAGE_CHARS: z.coerce.number().int().min(200).max(40000).default(3900),
  SNIPPET_THRESHOLD_CHARS: z.coerce.number().int().min(200).default(4000),
  MAX_QUEUE_PER_SESSION: z.coerce.number().int().min(1).max(200).default(16),

  SESSION_IDLE_MS: z.coerce.number().int().min(60000).default(24 * 60 * 60 * 1000),
  SESSION_SWEEP_INTERVAL_MS: z.coerce.number().int().min(1000).default(60 * 60 * 1000),
  SHUTDOWN_GRACE_MS: z.coerce.number().int().min(0).max(10 * 60 * 1000).default(10000),
  REACTION_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(3),
  REACTION_RETRY_BASE_MS: z.coerce.number().int().min(10).max(60000).default(250),

  ENGINE_MODE: z.enum(['process', 'mock']).default('process'),
  ENGINE_COMMAND: z.string().default('claude'),
  ENGINE_ARGS: z.string().default(''),
  ENGINE_TIMEOUT_MS: z.coerce.number().int().min(1000).default(30 * 60 * 1000),
  ENGINE_MAX_TURNS: z.coerce.number().int().min(0).default(0),
  ENGINE_MAX_BUDGET_USD: z.coerce.number().min(0).default(0),
  ENGINE_MODEL: z.string().default(''),
  ENGINE_PERMISSION_MODE: z.enum(['acceptEdits', 'dontAsk', 'bypassPermissions']).default('acceptEdits'),
  AGENT_HISTORY_FILE: z.string().default('~/.claude/history.jsonl'),
});

export const appConfigSchema = schemaBase.superRefine((input, ctx) => {
  if (input.ENGINE_MODE === 'process' && !input.ENGINE_COMMAND.trim()) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['ENGINE_COMMAND'],
      message: 'ENGINE_MODE=process requires ENGINE_COMMAND to be set.',
    });
  }

  if (input.ENGINE_PERMISSION_MODE === 'bypassPermissions' && strList(input.SLACK_ALLOWED_USERS).length !== 1) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['ENGINE_PERMISSION_MODE'],
      message: 'ENGINE_PERMISSION_MODE=bypassPermissions requires exactly one SLACK_ALLOWED_USERS entry.',
    });
  }

  if (input.SNIPPET_THRESHOLD_CHARS < input.MAX_MESSAGE_CHARS) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['SNIPPET_THRESHOLD_CHARS'],
      message: 'SNIPPET_THRESHOLD_CHARS must be at least MAX_MESSAGE_CHARS.',
    });
  }
});

type SchemaOutput = z.output<typeof appConfigSchema>;

const CONFIG_KEYS: string[] = Object.keys(schemaBase.shape);
const KNOWN_CONFIG_KEYS = new Set<string>(CONFIG_KEYS);

const ALLOWED_FOREIGN_ENV_KEYS = new Set<string>(['ANTHROPIC_API_KEY', 'RELAYBOT_ENV_FILE']);

const formatIssue = (issue: ZodIssue) => {
  const key = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${key}: ${issue.message}`;
};

export const formatConfigSchemaIssues = (issues: ZodIssue[]): string =>
  issues.map((issue) => `- ${formatIssue(issue)}`).join('\n');

const unknownDotenvKeys = (input: DotenvParseOutput | undefined): string[] => {
  if (!input) return [];
  return Object.keys(input)
    .filter((key) => !KNOWN_CONFIG_KEYS.has(key) && !ALLOWED_FOREIGN_ENV_KEYS.has(key))
    .sort();
};

const pickConfigValues = (env: NodeJS.ProcessEnv): Record<string, string | undefined> => {
  const output: Record<string, string | undefined> = {};
  for (const key of CONFIG_KEYS) {
    output[key] = env[key];
  }
  return output;
};

const envFilePath = process.env.RELAYBOT_ENV_FILE || path.join(process.cwd(), '.env');
const dotenvOutput = loadDotenv({ path: envFilePath });
if (dotenvOutput.error && systemErrorCode(dotenvOutput.error) !== 'ENOENT') {
  throw new Error(`Unable to load config file ${envFilePath}: ${dotenvOutput.error.message}`);
}

const parseSchema = (env: NodeJS.ProcessEnv): SchemaOutput => {
  const parsed = appConfigSchema.safeParse(pickConfigValues(env));
  if (!parsed.success) {
    throw new Error(`Invalid relaybot configuration:\n${formatConfigSchemaIssues(parsed.error.issues)}`);
  }
  return parsed.data;
};

export const parseAppConfig = (
  env: NodeJS.ProcessEnv = process.env,
  dotenvVars: DotenvParseOutput | undefined = dotenvOutput.parsed,
) => {
  const unknown = unknownDotenvKeys(dotenvVars);
  if (unknown.length > 0) {
    throw new Error(`Unknown config key(s) in ${envFilePath}: ${unknown.join(', ')}`);
  }

  const parsed = parseSchema(env);
  return {
    ...parsed,
    HANDOFF_FILE: parsed.HANDOFF_FILE || path.join(parsed.DATA_DIR, 'handoff-sessions.json'),
    ATTACHMENTS_DIR: parsed.ATTACHMENTS_DIR || path.join(parsed.DATA_DIR, 'attachments'),
    SLACK_ALLOWED_USERS: strList(parsed.SLACK_ALLOWED_USERS),
    SLACK_ALLOWED_CHANNELS: strList(parsed.SLACK_ALLOWED_CHANNELS),
    CHANNEL_DIRS: parseChannelDirs(parsed.CHANNEL_DIRS),
  };
};

export const config = parseAppConfig();

export type AppConfig = ReturnType<typeof parseAppConfig>;
