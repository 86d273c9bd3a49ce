#!/usr/bin/env node
import { config } from '../config.js';
import { isValidAlias } from '../control/aliases.js';
import { HandoffRegistry } from '../control/handoff-registry.js';
import { performHandoff } from '../control/handoff.js';
import { WorkspaceResolver } from '../control/workspace.js';
import { HandoffError } from '../shared/errors.js';
import { SlackHandoffPoster } from '../transports/slack/handoff-poster.js';
import { createLogger } from '../utils/logger.js';
import { formatStartupIssue, validateStartupConfig } from '../utils/startup.js';

class CliError extends Error {
  readonly hint?: string;

  constructor(message: string, hint?: string) {
    super(message);
    this.name = 'CliError';
    this.hint = hint;
  }
}

const fail = (message: string, hint?: string): never => {
  throw new CliError(message, hint);
};

const json = (value: unknown) => process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);

const parseArgs = (argv: string[]) => {
  const args = argv.slice(2);
  const command = args[0] || 'help';
  return { command, args: args.slice(1) };
};

const getFlag = (args: string[], name: string, fallback = '') => {
  const prefixed = `--${name}=`;
  const direct = args.find((arg) => arg.startsWith(prefixed));
  if (direct) return direct.slice(prefixed.length);

  const index = args.findIndex((arg) => arg === `--${name}`);
  if (index >= 0 && args[index + 1]) {
    return args[index + 1];
  }

  return fallback;
};

const hasFlag = (args: string[], name: string) => args.includes(name);

const registry = () =>
  new HandoffRegistry(config.HANDOFF_FILE, {
    maxRecords: config.HANDOFF_MAX_RECORDS,
    logger: createLogger('cli.handoff-registry', config.LOG_LEVEL),
  });

const runHandoff = async (args: string[]) => {
  const summary = getFlag(args, 'summary');
  if (!summary.trim()) {
    fail('handoff requires --summary', 'Example: relaybot handoff --summary "Auth refactor done; tests next"');
  }
  if (!config.SLACK_BOT_TOKEN) {
    fail('SLACK_BOT_TOKEN is not set', 'Add it to .env or export it before running handoff.');
  }

  const result = await performHandoff(
    {
      registry: registry(),
      workspace: new WorkspaceResolver({
        baseDirectory: config.BASE_DIRECTORY || undefined,
        channelDirs: config.CHANNEL_DIRS,
      }),
      poster: new SlackHandoffPoster(config.SLACK_BOT_TOKEN),
      historyFile: config.AGENT_HISTORY_FILE,
    },
    {
      summary,
      questions: getFlag(args, 'questions') || undefined,
      sessionIdentifier: getFlag(args, 'session-id') || undefined,
      channel: getFlag(args, 'channel') || undefined,
      cwd: getFlag(args, 'cwd') || undefined,
    },
  );

  if (hasFlag(args, '--json')) {
    json(result);
    return;
  }
  process.stdout.write(`Handoff posted to #${result.channelName} (${result.alias})\n`);
};

const help = () => {
  process.stdout.write('relaybot CLI\n\n');
  process.stdout.write('Commands:\n');
  process.stdout.write('  start                      run the Slack bridge in the foreground\n');
  process.stdout.write('  check [--json]             validate configuration without starting\n');
  process.stdout.write('  handoff --summary <text> [--questions <text>] [--session-id <id>] [--channel <name>] [--cwd <dir>] [--json]\n');
  process.stdout.write('  resolve <alias>            print the session id behind an alias\n');
  process.stdout.write('  handoffs                   list recorded handoffs\n\n');
  process.stdout.write('Examples:\n');
  process.stdout.write('  relaybot handoff --summary "Parser rewrite done" --questions "Keep the old API?"\n');
  process.stdout.write('  relaybot resolve quiet-neon-fox\n');
};

const main = async () => {
  const { command, args } = parseArgs(process.argv);

  if (command === 'start') {
    await import('../index.js');
    return;
  }

  if (command === 'check') {
    const issues = validateStartupConfig(config);
    if (hasFlag(args, '--json')) {
      json({ ok: !issues.some((entry) => entry.severity === 'error'), issues });
    } else {
      for (const entry of issues) {
        process.stdout.write(`${entry.severity}: [${entry.area}] ${formatStartupIssue(entry)}\n`);
      }
      if (!issues.length) process.stdout.write('configuration ok\n');
    }
    if (issues.some((entry) => entry.severity === 'error')) process.exitCode = 1;
    return;
  }

  if (command === 'handoff') {
    await runHandoff(args);
    return;
  }

  if (command === 'resolve') {
    const alias = args[0];
    if (!alias || !isValidAlias(alias)) {
      throw new CliError('resolve requires an alias', 'Example: relaybot resolve quiet-neon-fox');
    }
    const sessionIdentifier = await registry().resolve(alias);
    if (!sessionIdentifier) {
      fail(`unknown alias: ${alias}`, 'List known aliases with `relaybot handoffs`.');
    }
    process.stdout.write(`${sessionIdentifier}\n`);
    return;
  }

  if (command === 'handoffs') {
    json(await registry().list());
    return;
  }

  if (command === 'help' || command === '--help' || command === '-h') {
    help();
    return;
  }

  fail(`unknown command: ${command}`, 'Use `relaybot --help` to list commands.');
};

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  const hint = error instanceof CliError || error instanceof HandoffError ? error.hint : undefined;
  process.stderr.write(`relaybot cli error: ${message}\n`);
  if (hint) {
    process.stderr.write(`relaybot cli hint: ${hint}\n`);
  }
  process.exit(1);
});
