import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { HandoffError, systemErrorCode } from '../shared/errors.js';
import { expandPath } from '../utils/path.js';
import { generateAlias } from './aliases.js';
import type { HandoffRegistry } from './handoff-registry.js';
import { formatSessionMarker } from './markers.js';
import type { WorkspaceResolver } from './workspace.js';

/** The two Slack calls a handoff needs. */
export interface HandoffPoster {
  findChannelId(channelName: string): Promise<string | null>;
  postMessage(channelId: string, text: string): Promise<string>;
}

export interface HandoffDeps {
  registry: HandoffRegistry;
  workspace: WorkspaceResolver;
  poster: HandoffPoster;
  /** The agent CLI's local prompt history (JSON lines). */
  historyFile: string;
  random?: () => number;
}

export interface HandoffInput {
  summary: string;
  questions?: string;
  sessionIdentifier?: string;
  channel?: string;
  cwd?: string;
}

export interface HandoffResult {
  alias: string;
  sessionIdentifier: string;
  channelName: string;
  channelId: string;
  messageId: string;
  text: string;
}

const historyEntrySchema = z.object({ sessionId: z.string().min(1) });

/** Session id of the most recent entry in the agent's history file. */
export const resolveSessionIdFromHistory = async (historyFile: string): Promise<string> => {
  const file = expandPath(historyFile);
  let raw: string;
  try {
    raw = await fs.readFile(file, { encoding: 'utf8' });
  } catch (error) {
    if (systemErrorCode(error) === 'ENOENT') {
      throw new HandoffError(`no agent history found at ${file}`, 'Pass --session-id explicitly.');
    }
    throw error;
  }

  const lastLine = raw.trim().split('\n').pop() ?? '';
  let parsed: unknown;
  try {
    parsed = JSON.parse(lastLine);
  } catch {
    throw new HandoffError(`last line of ${file} is not JSON`, 'Pass --session-id explicitly.');
  }

  const entry = historyEntrySchema.safeParse(parsed);
  if (!entry.success) {
    throw new HandoffError(`could not read a session id from ${file}`, 'Pass --session-id explicitly.');
  }
  return entry.data.sessionId;
};

export const buildHandoffMessage = (summary: string, alias: string, questions?: string) => {
  const parts = [summary.trim()];
  if (questions?.trim()) parts.push(`\n${questions.trim()}`);
  parts.push(`\n${formatSessionMarker(alias)}`);
  return parts.join('\n');
};

/**
 * Publishes a running agent session to its project channel. The message ends
 * with the session marker, so a reply in its thread resumes the session.
 * Nothing stops the source terminal from continuing to use the session; the
 * user closes it before replying in Slack.
 */
export const performHandoff = async (deps: HandoffDeps, input: HandoffInput): Promise<HandoffResult> => {
  if (!input.summary.trim()) {
    throw new HandoffError('a handoff needs a summary', 'Pass --summary "what was done and what is next".');
  }

  const sessionIdentifier = input.sessionIdentifier || (await resolveSessionIdFromHistory(deps.historyFile));

  const cwd = path.resolve(expandPath(input.cwd || process.cwd()));
  const channelName = input.channel?.replace(/^#/, '') || deps.workspace.channelFor(cwd);
  if (!channelName) {
    throw new HandoffError(
      `could not resolve a Slack channel for ${cwd}`,
      'Use --channel to name one, or map the directory in CHANNEL_DIRS.',
    );
  }

  const channelId = await deps.poster.findChannelId(channelName);
  if (!channelId) {
    throw new HandoffError(`channel #${channelName} not found`, 'Check the name and invite the bot to the channel.');
  }

  const alias = await generateAlias({
    isTaken: (candidate) => deps.registry.has(candidate),
    random: deps.random,
  });
  await deps.registry.recordHandoff(sessionIdentifier, alias, `cli:${cwd}`);

  const text = buildHandoffMessage(input.summary, alias, input.questions);
  const messageId = await deps.poster.postMessage(channelId, text);
  return { alias, sessionIdentifier, channelName, channelId, messageId, text };
};
