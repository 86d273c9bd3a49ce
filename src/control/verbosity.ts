import type { AgentEvent } from '../engine/types.js';

export type Verbosity = 'minimal' | 'normal' | 'verbose';

/** Tool whose results are never shown (file bodies are noise in a thread). */
const QUIET_RESULT_TOOLS = new Set(['Read']);
/** Tools that never produce an activity line. */
const SILENT_TOOLS = new Set(['EnterPlanMode', 'ExitPlanMode', 'AskUserQuestion']);

export const shouldShow = (verbosity: Verbosity, event: AgentEvent): boolean => {
  switch (event.type) {
    case 'session':
      return false;
    case 'text':
    case 'completion':
    case 'error':
      return true;
    case 'tool_activity':
      return verbosity !== 'minimal' && !SILENT_TOOLS.has(event.toolName);
    case 'tool_result':
      if (event.isError) return verbosity !== 'minimal';
      return verbosity === 'verbose' && !QUIET_RESULT_TOOLS.has(event.toolName);
    case 'compaction':
      return verbosity === 'verbose';
  }
};
