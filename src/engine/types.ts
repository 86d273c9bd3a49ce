/** The agent announced the session it is running; sent before any output. */
export interface SessionEvent {
  type: 'session';
  sessionIdentifier: string;
}

export interface TextEvent {
  type: 'text';
  text: string;
}

export interface ToolActivityEvent {
  type: 'tool_activity';
  toolName: string;
  toolUseId?: string;
  /** One-line description, e.g. "Reading src/app.ts". */
  summary: string;
  /** Set when the call was made by a sub-agent. */
  parentToolUseId?: string;
}

export interface ToolResultEvent {
  type: 'tool_result';
  toolUseId?: string;
  toolName: string;
  output: string;
  isError: boolean;
}

export type CompletionSubtype =
  | 'success'
  | 'error_max_turns'
  | 'error_max_budget_usd'
  | 'error_during_execution'
  | (string & {});

export interface CompletionEvent {
  type: 'completion';
  sessionIdentifier: string;
  subtype: CompletionSubtype;
  isError: boolean;
  costUsd?: number;
  numTurns?: number;
  durationMs?: number;
  resultText?: string;
  permissionDenials: string[];
}

export interface ErrorEvent {
  type: 'error';
  message: string;
  /** The agent no longer knows the session it was asked to resume. */
  sessionLost?: boolean;
}

export interface CompactionEvent {
  type: 'compaction';
  trigger: 'auto' | 'manual';
  preTokens?: number;
}

export type AgentEvent =
  | SessionEvent
  | TextEvent
  | ToolActivityEvent
  | ToolResultEvent
  | CompletionEvent
  | ErrorEvent
  | CompactionEvent;

export interface TurnLimits {
  maxTurns?: number;
  maxBudgetUsd?: number;
}

export interface StartTurnInput {
  prompt: string;
  workingDirectory: string;
  systemPreamble?: string;
  limits?: TurnLimits;
}

export interface ResumeTurnInput {
  sessionIdentifier: string;
  prompt: string;
  workingDirectory: string;
  limits?: TurnLimits;
}

/**
 * Drives the coding agent. Aborting the signal interrupts the in-flight turn;
 * the stream then ends without a completion event.
 */
export interface AgentEngine {
  start(input: StartTurnInput, signal?: AbortSignal): AsyncIterable<AgentEvent>;
  resume(input: ResumeTurnInput, signal?: AbortSignal): AsyncIterable<AgentEvent>;
  ping(): Promise<boolean>;
}
