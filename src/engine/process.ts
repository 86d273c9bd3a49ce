import { spawn, type ChildProcessWithoutNullStreams } from 'node:child_process';
import readline from 'node:readline';
import { Logger } from '../utils/logger.js';
import { expandPath } from '../utils/path.js';
import { StreamJsonParser } from './stream-json.js';
import type { AgentEngine, AgentEvent, ResumeTurnInput, StartTurnInput, TurnLimits } from './types.js';

const ENGINE_ENV_ALLOWLIST = [
  'HOME',
  'PATH',
  'USER',
  'LOGNAME',
  'SHELL',
  'LANG',
  'LC_ALL',
  'TZ',
  'TMPDIR',
  'HTTPS_PROXY',
  'HTTP_PROXY',
  'NO_PROXY',
  'ANTHROPIC_API_KEY',
  'ANTHROPIC_BASE_URL',
  'CLAUDE_CONFIG_DIR',
  'CLAUDE_CODE_USE_BEDROCK',
  'CLAUDE_CODE_USE_VERTEX',
  'AWS_PROFILE',
  'AWS_ACCESS_KEY_ID',
  'AWS_SECRET_ACCESS_KEY',
  'AWS_SESSION_TOKEN',
  'AWS_REGION',
] as const;

const KILL_GRACE_MS = 5000;
const STDERR_TAIL_CHARS = 2000;
const SESSION_LOST_RE = /no conversation found/i;

export const buildEngineEnv = (cwd: string, source: NodeJS.ProcessEnv = process.env): NodeJS.ProcessEnv => {
  const base: NodeJS.ProcessEnv = { PWD: cwd };

  for (const key of ENGINE_ENV_ALLOWLIST) {
    const value = source[key];
    if (typeof value === 'string' && value.length > 0) {
      base[key] = value;
    }
  }

  return base;
};

export const splitCommand = (command: string, args: string) => {
  const parsed = args && args.trim().length > 0
    ? args
        .trim()
        .match(/(?:"[^"]*"|[^\s"]+)/g)
        ?.map((value) => value.replace(/^"(.*)"$/, '$1')) ?? []
    : [];
  return [command, ...parsed];
};

export interface ProcessEngineOptions {
  command: string;
  /** Extra arguments placed before the generated ones. */
  args?: string;
  model?: string;
  permissionMode?: string;
  defaultLimits?: TurnLimits;
  logger?: Logger;
}

interface TurnRequest {
  prompt: string;
  workingDirectory: string;
  resume?: string;
  systemPreamble?: string;
  limits?: TurnLimits;
}

type ExitStatus = { code: number | null; signal: NodeJS.Signals | null } | { error: Error };

/**
 * Runs one agent turn per child process (`-p` with `stream-json` output) and
 * yields parsed events as lines arrive. Aborting the signal terminates the
 * child; the stream then ends without a completion event.
 */
export class ProcessEngine implements AgentEngine {
  private readonly logger: Logger;

  constructor(private readonly options: ProcessEngineOptions) {
    this.logger = options.logger ?? new Logger('engine.process');
  }

  start(input: StartTurnInput, signal?: AbortSignal): AsyncIterable<AgentEvent> {
    return this.run(
      {
        prompt: input.prompt,
        workingDirectory: input.workingDirectory,
        systemPreamble: input.systemPreamble,
        limits: input.limits,
      },
      signal,
    );
  }

  resume(input: ResumeTurnInput, signal?: AbortSignal): AsyncIterable<AgentEvent> {
    return this.run(
      {
        prompt: input.prompt,
        workingDirectory: input.workingDirectory,
        resume: input.sessionIdentifier,
        limits: input.limits,
      },
      signal,
    );
  }

  buildArgs(request: TurnRequest): string[] {
    const [, ...extra] = splitCommand(this.options.command, this.options.args ?? '');
    const args = [...extra, '-p', request.prompt, '--output-format', 'stream-json', '--verbose'];
    if (request.resume) args.push('--resume', request.resume);
    if (request.systemPreamble) args.push('--append-system-prompt', request.systemPreamble);
    if (this.options.model) args.push('--model', this.options.model);
    if (this.options.permissionMode) args.push('--permission-mode', this.options.permissionMode);

    const limits = { ...this.options.defaultLimits, ...request.limits };
    if (limits.maxTurns) args.push('--max-turns', String(limits.maxTurns));
    if (limits.maxBudgetUsd) args.push('--max-budget-usd', String(limits.maxBudgetUsd));
    return args;
  }

  private async *run(request: TurnRequest, signal?: AbortSignal): AsyncGenerator<AgentEvent> {
    if (signal?.aborted) return;

    const cwd = expandPath(request.workingDirectory);
    const args = this.buildArgs(request);
    const child = spawn(this.options.command, args, {
      cwd,
      env: buildEngineEnv(cwd),
      stdio: ['pipe', 'pipe', 'pipe'],
      windowsHide: true,
    });

    // Prompts go in argv; an open stdin can make the CLI wait for input.
    child.stdin.end();

    const exited = new Promise<ExitStatus>((resolve) => {
      child.once('error', (error) => resolve({ error }));
      child.once('close', (code, exitSignal) => resolve({ code, signal: exitSignal }));
    });

    let stderr = '';
    child.stderr.setEncoding('utf8');
    child.stderr.on('data', (chunk: string) => {
      stderr = (stderr + chunk).slice(-STDERR_TAIL_CHARS);
    });

    let killTimer: ReturnType<typeof setTimeout> | undefined;
    const onAbort = () => {
      this.terminate(child);
      killTimer = setTimeout(() => child.kill('SIGKILL'), KILL_GRACE_MS);
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    const parser = new StreamJsonParser();
    let completed = false;
    try {
      const lines = readline.createInterface({ input: child.stdout, crlfDelay: Infinity });
      for await (const line of lines) {
        for (const event of parser.parseLine(line)) {
          if (event.type === 'completion') completed = true;
          yield event;
        }
      }

      const status = await exited;
      if (signal?.aborted) return;

      if ('error' in status) {
        this.logger.error('agent process failed to start', { command: this.options.command, cwd, message: status.error.message });
        yield { type: 'error', message: `Could not start ${this.options.command}: ${status.error.message}` };
        return;
      }

      if (status.code !== 0 && !completed) {
        const detail = stderr.trim();
        this.logger.warn('agent process exited abnormally', {
          code: status.code,
          signal: status.signal,
          resume: request.resume,
          stderr: detail || undefined,
        });
        yield {
          type: 'error',
          message: detail ? detail.split('\n').slice(-3).join('\n') : `agent exited with code ${status.code ?? status.signal}`,
          sessionLost: Boolean(request.resume) && SESSION_LOST_RE.test(detail),
        };
      }
    } finally {
      signal?.removeEventListener('abort', onAbort);
      if (child.exitCode === null && child.signalCode === null) {
        this.terminate(child);
        killTimer ??= setTimeout(() => child.kill('SIGKILL'), KILL_GRACE_MS);
      }
      await exited;
      if (killTimer) clearTimeout(killTimer);
    }
  }

  private terminate(child: ChildProcessWithoutNullStreams) {
    if (!child.killed) child.kill('SIGTERM');
  }

  async ping() {
    const [cmd, ...cmdArgs] = splitCommand(this.options.command, this.options.args ?? '');
    const child = spawn(cmd, [...cmdArgs, '--version'], { env: buildEngineEnv(process.cwd()), stdio: 'ignore' });
    return new Promise<boolean>((resolve) => {
      child.once('error', () => resolve(false));
      child.once('close', (code) => resolve(code === 0));
    });
  }
}
