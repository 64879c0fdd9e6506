import type { LlmMessage } from '../llm';
import { composeProfileGuidance, type ProfileBag } from '../session/profile';
import type { ToolDescriptor } from '../tools/registry';
import type { Turn } from '../types';

export interface SystemPromptInput {
  tools: ToolDescriptor[];
  profile: ProfileBag;
  channel?: string;
  /** One-off instruction for a re-ask; never persisted. */
  correction?: string;
}

const PERSONA = [
  'You are TripGuard, a travel insurance assistant. You help travellers compare plans, understand policy wording,',
  'assess risk from historical claims, and buy a policy. Keep answers concise and empathetic, and cite policy clause ids',
  'when you rely on policy wording.',
].join(' ');

const RESPONSE_PROTOCOL = [
  'Respond with exactly one JSON object and nothing else:',
  '{"output": "<message for the traveller, or empty while you call tools>", "actions": [{"tool": "<tool name>", "input": {}}]}',
  'Use "actions": [] when you are answering the traveller. Only call tools listed under [Tools], with inputs matching',
  'their schema. Tool results come back as user messages starting with "Tool result"; read them before answering.',
  'Tools marked write-once create payments or policies: call them only after the traveller confirmed their details.',
].join('\n');

export function renderToolCatalog(tools: ToolDescriptor[]): string {
  const entries = tools.map((tool) =>
    JSON.stringify({
      name: tool.name,
      description: tool.description,
      side_effect: tool.sideEffect,
      input_schema: tool.inputSchema,
    }),
  );
  return `[Tools]\n${entries.join('\n')}`;
}

export function buildSystemPrompt(input: SystemPromptInput): string {
  const sections = [PERSONA];
  if (input.channel) {
    sections.push(`The traveller is writing through the ${input.channel} channel; format replies for it.`);
  }
  sections.push(renderToolCatalog(input.tools), RESPONSE_PROTOCOL);

  const guidance = composeProfileGuidance(input.profile);
  if (guidance) {
    sections.push(guidance);
  }
  if (input.correction) {
    sections.push(`[Correction]\n${input.correction}`);
  }
  return sections.join('\n\n');
}

/**
 * Renders persisted turns as the message list sent to the model. The output
 * depends only on the turns, so replaying a session's history reproduces the
 * exact context of its last reasoning step.
 */
export function renderHistory(turns: readonly Turn[]): LlmMessage[] {
  const messages: LlmMessage[] = [];
  for (const turn of turns) {
    switch (turn.role) {
      case 'user':
        messages.push({ role: 'user', content: turn.content });
        break;
      case 'assistant':
        messages.push({ role: 'assistant', content: JSON.stringify({ output: turn.content, actions: [] }) });
        break;
      case 'tool':
        messages.push(
          { role: 'assistant', content: JSON.stringify({ output: '', actions: [{ tool: turn.toolName, input: turn.input }] }) },
          { role: 'user', content: `Tool result for ${turn.toolName}: ${JSON.stringify(turn.result)}` },
        );
        break;
    }
  }
  return messages;
}
