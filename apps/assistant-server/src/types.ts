import type { ProfileBag } from './session/profile';

export type SideEffectClass = 'read' | 'write-idempotent' | 'write-once';

export type ToolErrorKind = 'InvalidInput' | 'NotFound' | 'Upstream' | 'AmbiguousOutcome';

export interface ToolResultOk {
  status: 'ok';
  payload: unknown;
  /** Evidence attached to the conversation, e.g. cited policy clause ids. */
  citation?: string;
  cached?: boolean;
}

export interface ToolResultError {
  status: 'error';
  kind: ToolErrorKind;
  message: string;
  retryable: boolean;
  citation?: string;
  cached?: boolean;
}

export type ToolResultEnvelope = ToolResultOk | ToolResultError;

export interface UserTurn {
  readonly role: 'user';
  readonly content: string;
  readonly channel?: string;
  readonly createdAt: string;
}

export interface AssistantTurn {
  readonly role: 'assistant';
  readonly content: string;
  readonly createdAt: string;
}

export interface ToolTurn {
  readonly role: 'tool';
  readonly toolName: string;
  readonly input: unknown;
  readonly result: ToolResultEnvelope;
  readonly createdAt: string;
}

export type Turn = UserTurn | AssistantTurn | ToolTurn;

export interface Session {
  id: string;
  turns: Turn[];
  profile: ProfileBag;
  /** Count of inbound messages committed to this session. */
  turnCounter: number;
  createdAt: string;
  updatedAt: string;
}

export interface InboundMessage {
  sessionId: string;
  text: string;
  channel?: string;
  /** Distribution partner the message arrived through; selects partner-scoped LLM keys. */
  partnerId?: string;
  profilePatch?: ProfileBag;
}

export interface ToolRunRecord {
  name: string;
  input: unknown;
  resultStatus: ToolResultEnvelope['status'];
  errorKind?: ToolErrorKind;
  cached?: boolean;
}

export type StallReason = 'tool_budget' | 'malformed_output' | 'reasoning_unavailable' | 'conversation_limit';

export interface TurnResult {
  requestId: string;
  sessionId: string;
  replyText: string;
  outcome: 'replied' | 'stalled';
  stallReason?: StallReason;
  toolRuns: ToolRunRecord[];
}
