import { randomUUID } from 'node:crypto';
import type { AgentEngine, AgentEvent, ResumeTurnInput, StartTurnInput } from './types.js';

/** Offline engine for `ENGINE_MODE=mock`: echoes the prompt and completes. */
export class MockEngine implements AgentEngine {
  async *start(input: StartTurnInput, signal?: AbortSignal): AsyncGenerator<AgentEvent> {
    yield* this.reply(randomUUID(), input.prompt, signal);
  }

  async *resume(input: ResumeTurnInput, signal?: AbortSignal): AsyncGenerator<AgentEvent> {
    yield* this.reply(input.sessionIdentifier, input.prompt, signal);
  }

  private async *reply(sessionIdentifier: string, prompt: string, signal?: AbortSignal): AsyncGenerator<AgentEvent> {
    if (signal?.aborted) return;
    yield { type: 'session', sessionIdentifier };
    const trimmed = prompt.trim();
    yield {
      type: 'text',
      text: trimmed ? `You asked: "${trimmed.slice(0, 180)}".` : 'Received an empty message.',
    };
    if (signal?.aborted) return;
    yield {
      type: 'completion',
      sessionIdentifier,
      subtype: 'success',
      isError: false,
      numTurns: 1,
      durationMs: 0,
      permissionDenials: [],
    };
  }

  async ping() {
    return true;
  }
}
