import fs from 'node:fs';
import path from 'node:path';
import { execFileSync } from 'node:child_process';
import type { AppConfig } from '../config.js';
import { expandPath } from './path.js';

export interface StartupIssue {
  severity: 'warn' | 'error';
  area: string;
  message: string;
  remediation?: string;
  code?: string;
}

export class StartupValidationError extends Error {
  constructor(readonly issues: StartupIssue[]) {
    super(`Startup validation failed:\n${issues.map((entry) => `- ${formatStartupIssue(entry)}`).join('\n')}`);
    this.name = 'StartupValidationError';
  }

  get errorCount() {
    return this.issues.filter((entry) => entry.severity === 'error').length;
  }
}

export type StartupConfig = Pick<
  AppConfig,
  | 'DATA_DIR'
  | 'HANDOFF_FILE'
  | 'SLACK_BOT_TOKEN'
  | 'SLACK_APP_TOKEN'
  | 'SLACK_SIGNING_SECRET'
  | 'SLACK_ALLOWED_USERS'
  | 'SLACK_ALLOWED_CHANNELS'
  | 'BASE_DIRECTORY'
  | 'CHANNEL_DIRS'
  | 'ENGINE_MODE'
  | 'ENGINE_COMMAND'
  | 'ENGINE_PERMISSION_MODE'
>;

const ensureDirWritable = (targetPath: string): string | null => {
  try {
    fs.mkdirSync(targetPath, { recursive: true });
    fs.accessSync(targetPath, fs.constants.F_OK | fs.constants.R_OK | fs.constants.W_OK);
    return null;
  } catch (error) {
    return error instanceof Error ? error.message : String(error);
  }
};

const commandExists = (command: string): boolean => {
  if (!command.trim()) {
    return false;
  }

  if (command.includes('/')) {
    return fs.existsSync(expandPath(command));
  }

  try {
    execFileSync('sh', ['-lc', `command -v ${JSON.stringify(command)}`], { stdio: 'ignore' });
    return true;
  } catch {
    return false;
  }
};

const issue = (entry: StartupIssue): StartupIssue => entry;

export const formatStartupIssue = (input: StartupIssue) => {
  if (!input.remediation) {
    return input.message;
  }
  return `${input.message} Remediation: ${input.remediation}`;
};

export const validateStartupConfig = (config: StartupConfig): StartupIssue[] => {
  const issues: StartupIssue[] = [];

  if (!config.SLACK_BOT_TOKEN || !config.SLACK_APP_TOKEN || !config.SLACK_SIGNING_SECRET) {
    issues.push(
      issue({
        severity: 'error',
        area: 'transports',
        message: 'SLACK_BOT_TOKEN, SLACK_APP_TOKEN and SLACK_SIGNING_SECRET are required.',
        remediation: 'Create a Socket Mode Slack app and set the three values in .env.',
        code: 'slack_missing_secrets',
      }),
    );
  }

  if (config.ENGINE_MODE === 'process' && !config.ENGINE_COMMAND.trim()) {
    issues.push(
      issue({
        severity: 'error',
        area: 'engine',
        message: 'ENGINE_MODE=process requires ENGINE_COMMAND to be set.',
        remediation: 'Set ENGINE_COMMAND to the agent CLI (for example: claude) or switch ENGINE_MODE=mock for local smoke testing.',
        code: 'missing_engine_command',
      }),
    );
  } else if (config.ENGINE_MODE === 'process' && !commandExists(config.ENGINE_COMMAND)) {
    issues.push(
      issue({
        severity: 'error',
        area: 'engine',
        message: `ENGINE_COMMAND "${config.ENGINE_COMMAND}" is not executable or not on PATH.`,
        remediation: 'Install the agent CLI, use an absolute ENGINE_COMMAND path, or switch ENGINE_MODE=mock.',
        code: 'engine_command_not_found',
      }),
    );
  }

  if (!config.SLACK_ALLOWED_USERS.length) {
    issues.push(
      issue({
        severity: 'warn',
        area: 'security',
        message: 'SLACK_ALLOWED_USERS is empty; every workspace member can drive the agent.',
        remediation: 'List the Slack member IDs allowed to use the bot in SLACK_ALLOWED_USERS.',
        code: 'open_access',
      }),
    );
  }

  if (config.ENGINE_PERMISSION_MODE === 'bypassPermissions') {
    issues.push(
      issue({
        severity: 'warn',
        area: 'security',
        message: 'ENGINE_PERMISSION_MODE=bypassPermissions lets the agent run any tool without asking.',
        code: 'bypass_permissions',
      }),
    );
  }

  const channelDirs = Object.entries(config.CHANNEL_DIRS);
  if (!config.BASE_DIRECTORY) {
    if (!channelDirs.length) {
      issues.push(
        issue({
          severity: 'warn',
          area: 'workspace',
          message: 'Neither BASE_DIRECTORY nor CHANNEL_DIRS is set; every message will be rejected.',
          remediation: 'Set BASE_DIRECTORY to the directory holding your projects.',
          code: 'no_workspace',
        }),
      );
    } else if (channelDirs.some(([, dir]) => !path.isAbsolute(expandPath(dir)))) {
      issues.push(
        issue({
          severity: 'warn',
          area: 'workspace',
          message: 'CHANNEL_DIRS has relative paths but BASE_DIRECTORY is unset; they resolve against the current directory.',
          remediation: 'Set BASE_DIRECTORY or use absolute paths in CHANNEL_DIRS.',
          code: 'relative_channel_dirs',
        }),
      );
    }
  } else {
    const base = expandPath(config.BASE_DIRECTORY);
    if (!fs.existsSync(base) || !fs.statSync(base).isDirectory()) {
      issues.push(
        issue({
          severity: 'error',
          area: 'workspace',
          message: `BASE_DIRECTORY does not exist or is not a directory (${base}).`,
          remediation: `Create it with: mkdir -p "${base}"`,
          code: 'base_directory_missing',
        }),
      );
    }
  }

  const expandedDataDir = expandPath(config.DATA_DIR);
  const dataDirErr = ensureDirWritable(expandedDataDir);
  if (dataDirErr) {
    issues.push(
      issue({
        severity: 'error',
        area: 'storage',
        message: `DATA_DIR is not writable (${expandedDataDir}): ${dataDirErr}`,
        remediation: `Create and chown the directory: mkdir -p "${expandedDataDir}" && chown -R $(id -un):$(id -gn) "${expandedDataDir}"`,
        code: 'data_dir_not_writable',
      }),
    );
  }

  const handoffDir = path.dirname(expandPath(config.HANDOFF_FILE));
  if (handoffDir !== expandedDataDir) {
    const handoffDirErr = ensureDirWritable(handoffDir);
    if (handoffDirErr) {
      issues.push(
        issue({
          severity: 'error',
          area: 'storage',
          message: `HANDOFF_FILE directory is not writable (${handoffDir}): ${handoffDirErr}`,
          code: 'handoff_dir_not_writable',
        }),
      );
    }
  }

  if (process.getuid?.() === 0) {
    issues.push(
      issue({
        severity: 'warn',
        area: 'runtime',
        message: 'Running as root; prefer a dedicated non-root user.',
        code: 'running_as_root',
      }),
    );
  }

  return issues;
};

export const validateStartupConfigOrThrow = (config: StartupConfig) => {
  const issues = validateStartupConfig(config);
  if (issues.some((entry) => entry.severity === 'error')) {
    throw new StartupValidationError(issues);
  }
  return issues;
};
