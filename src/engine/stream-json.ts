import path from 'node:path';
import { z } from 'zod';
import type { AgentEvent } from './types.js';

const textBlock = z.object({ type: z.literal('text'), text: z.string() });
const toolUseBlock = z.object({
  type: z.literal('tool_use'),
  id: z.string().optional(),
  name: z.string(),
  input: z.record(z.unknown()).default({}),
});
const toolResultBlock = z.object({
  type: z.literal('tool_result'),
  tool_use_id: z.string().optional(),
  content: z.union([z.string(), z.array(z.object({ type: z.string(), text: z.string().optional() }).passthrough())]).optional(),
  is_error: z.boolean().optional(),
});

const contentBlock = z.union([textBlock, toolUseBlock, toolResultBlock, z.object({ type: z.string() }).passthrough()]);

const assistantLine = z.object({
  type: z.literal('assistant'),
  message: z.object({ content: z.array(contentBlock) }),
  parent_tool_use_id: z.string().nullable().optional(),
});

const userLine = z.object({
  type: z.literal('user'),
  message: z.object({ content: z.union([z.string(), z.array(contentBlock)]) }),
});

const resultLine = z.object({
  type: z.literal('result'),
  subtype: z.string(),
  is_error: z.boolean().default(false),
  session_id: z.string(),
  total_cost_usd: z.number().optional(),
  num_turns: z.number().optional(),
  duration_ms: z.number().optional(),
  result: z.string().optional(),
  permission_denials: z.array(z.object({ tool_name: z.string().default('unknown') }).passthrough()).default([]),
});

const systemLine = z.object({
  type: z.literal('system'),
  subtype: z.string(),
  session_id: z.string().optional(),
  compact_metadata: z
    .object({
      trigger: z.enum(['auto', 'manual']).default('auto'),
      pre_tokens: z.number().optional(),
    })
    .optional(),
});

const str = (value: unknown) => (typeof value === 'string' ? value : '');
const basename = (value: unknown) => (typeof value === 'string' && value ? path.basename(value) : 'file');
const clip = (value: string, max = 80) => (value.length > max ? `${value.slice(0, max - 1)}…` : value);

/** One-line, human-readable description of a tool call. */
export const describeToolUse = (name: string, input: Record<string, unknown>): string => {
  switch (name) {
    case 'Read':
      return `Reading \`${basename(input.file_path)}\``;
    case 'Write':
      return `Writing \`${basename(input.file_path)}\``;
    case 'Edit':
    case 'MultiEdit':
      return `Editing \`${basename(input.file_path)}\``;
    case 'Bash': {
      const description = str(input.description);
      return description || `Running \`${clip(str(input.command))}\``;
    }
    case 'Grep':
      return `Searching for \`${clip(str(input.pattern))}\``;
    case 'Glob':
      return `Finding files \`${clip(str(input.pattern))}\``;
    case 'WebFetch':
      return `Fetching \`${clip(str(input.url))}\``;
    case 'WebSearch':
      return `Searching the web for \`${clip(str(input.query))}\``;
    case 'Task': {
      const parts = [str(input.subagent_type), str(input.description)].filter(Boolean);
      return parts.length ? `Spawning ${parts.join(': ')}` : 'Spawning subagent';
    }
    case 'TodoWrite':
      return 'Updating the task list';
    default:
      return `Using \`${name}\``;
  }
};

const resultText = (content: z.infer<typeof toolResultBlock>['content']) => {
  if (content === undefined) return '';
  if (typeof content === 'string') return content;
  return content
    .map((block) => block.text ?? '')
    .filter(Boolean)
    .join('\n');
};

/**
 * Stateful reader for the agent's `stream-json` output. Tool results only
 * carry the tool-use id, so the parser remembers which tool each id named.
 */
export class StreamJsonParser {
  private readonly toolNames = new Map<string, string>();
  sessionIdentifier: string | null = null;

  parseLine(line: string): AgentEvent[] {
    const trimmed = line.trim();
    if (!trimmed) return [];

    let raw: unknown;
    try {
      raw = JSON.parse(trimmed);
    } catch {
      // Non-JSON lines are diagnostics printed by the CLI itself.
      return [];
    }
    return this.parse(raw);
  }

  parse(raw: unknown): AgentEvent[] {
    const assistant = assistantLine.safeParse(raw);
    if (assistant.success) return this.fromAssistant(assistant.data);

    const user = userLine.safeParse(raw);
    if (user.success) return this.fromUser(user.data);

    const result = resultLine.safeParse(raw);
    if (result.success) {
      const data = result.data;
      this.sessionIdentifier = data.session_id;
      return [
        {
          type: 'completion',
          sessionIdentifier: data.session_id,
          subtype: data.subtype,
          isError: data.is_error,
          costUsd: data.total_cost_usd,
          numTurns: data.num_turns,
          durationMs: data.duration_ms,
          resultText: data.result,
          permissionDenials: data.permission_denials.map((denial) => denial.tool_name),
        },
      ];
    }

    const system = systemLine.safeParse(raw);
    if (system.success) {
      const data = system.data;
      if (data.subtype === 'init' && data.session_id) {
        this.sessionIdentifier = data.session_id;
        return [{ type: 'session', sessionIdentifier: data.session_id }];
      }
      if (data.subtype === 'compact_boundary') {
        return [
          {
            type: 'compaction',
            trigger: data.compact_metadata?.trigger ?? 'auto',
            preTokens: data.compact_metadata?.pre_tokens,
          },
        ];
      }
    }

    return [];
  }

  private fromAssistant(data: z.infer<typeof assistantLine>): AgentEvent[] {
    const events: AgentEvent[] = [];
    const parentToolUseId = data.parent_tool_use_id ?? undefined;
    for (const block of data.message.content) {
      const text = textBlock.safeParse(block);
      if (text.success) {
        // Sub-agent narration stays out of the thread.
        if (!parentToolUseId && text.data.text) events.push({ type: 'text', text: text.data.text });
        continue;
      }
      const tool = toolUseBlock.safeParse(block);
      if (tool.success) {
        if (tool.data.id) this.toolNames.set(tool.data.id, tool.data.name);
        events.push({
          type: 'tool_activity',
          toolName: tool.data.name,
          toolUseId: tool.data.id,
          summary: describeToolUse(tool.data.name, tool.data.input),
          parentToolUseId,
        });
      }
    }
    return events;
  }

  private fromUser(data: z.infer<typeof userLine>): AgentEvent[] {
    if (typeof data.message.content === 'string') return [];
    const events: AgentEvent[] = [];
    for (const block of data.message.content) {
      const parsed = toolResultBlock.safeParse(block);
      if (!parsed.success) continue;
      const toolUseId = parsed.data.tool_use_id;
      events.push({
        type: 'tool_result',
        toolUseId,
        toolName: (toolUseId && this.toolNames.get(toolUseId)) || 'Tool',
        output: resultText(parsed.data.content),
        isError: parsed.data.is_error ?? false,
      });
    }
    return events;
  }
}
