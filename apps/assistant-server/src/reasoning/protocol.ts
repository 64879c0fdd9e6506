import { z } from 'zod';

/** A tool the model asked for. `input` is untrusted until the executor validates it. */
export interface ToolCallDirective {
  name: string;
  input: unknown;
}

export type ReasoningOutcome =
  | { kind: 'plain_reply'; text: string }
  | { kind: 'tool_call'; directives: ToolCallDirective[]; note?: string }
  | { kind: 'malformed_output'; detail: string; raw: string }
  | { kind: 'unavailable'; detail: string };

const actionSchema = z.object({
  tool: z.string().trim().min(1),
  input: z.record(z.unknown()).default({}),
});

const responseSchema = z.object({
  output: z.string().optional(),
  actions: z.array(z.unknown()).optional(),
});

const legacyActionSchema = z.object({
  action: z.string().trim().min(1),
  input: z.record(z.unknown()).default({}),
});

function malformed(detail: string, raw: string): ReasoningOutcome {
  return { kind: 'malformed_output', detail, raw };
}

/** Drops a Markdown code fence around the payload, if the model added one. */
function unfence(text: string): string {
  const fenced = /^```(?:json)?\s*\n?([\s\S]*?)\n?```$/i.exec(text);
  return fenced?.[1]?.trim() ?? text;
}

function decodeJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    const start = text.indexOf('{');
    const end = text.lastIndexOf('}');
    if (start < 0 || end <= start) {
      return { ok: false };
    }
    try {
      return { ok: true, value: JSON.parse(text.slice(start, end + 1)) };
    } catch {
      return { ok: false };
    }
  }
}

/**
 * Parses one model response into a reasoning outcome.
 *
 * Accepted shapes are `{"output": "...", "actions": [{"tool", "input"}]}` and the
 * single-action form `{"action": "...", "input": {...}}`. Anything else,
 * including an action list with a bad entry, is `malformed_output`.
 */
export function parseReasoningOutput(raw: string): ReasoningOutcome {
  const text = unfence(raw.trim());
  if (!text) {
    return malformed('empty response', raw);
  }

  const decoded = decodeJson(text);
  if (!decoded.ok) {
    return malformed('response is not JSON', raw);
  }

  const legacy = legacyActionSchema.safeParse(decoded.value);
  if (legacy.success) {
    return { kind: 'tool_call', directives: [{ name: legacy.data.action, input: legacy.data.input }] };
  }

  const parsed = responseSchema.safeParse(decoded.value);
  if (!parsed.success) {
    return malformed('response is not a JSON object with output/actions', raw);
  }

  const output = parsed.data.output?.trim() ?? '';
  const actions = parsed.data.actions ?? [];

  if (actions.length > 0) {
    const directives: ToolCallDirective[] = [];
    for (const [index, action] of actions.entries()) {
      const entry = actionSchema.safeParse(action);
      if (!entry.success) {
        return malformed(`actions[${index}] is not a {tool, input} object`, raw);
      }
      directives.push({ name: entry.data.tool, input: entry.data.input });
    }
    return output ? { kind: 'tool_call', directives, note: output } : { kind: 'tool_call', directives };
  }

  if (output) {
    return { kind: 'plain_reply', text: output };
  }
  return malformed('response has neither output nor actions', raw);
}
