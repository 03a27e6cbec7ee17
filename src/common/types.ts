export interface TemporalExtractionResult {
  date: string | null; // YYYY-MM-DD
  time: string | null; // HH:MM, 24-hour
  recurrence: string | null; // "daily", "weekly-monday", "every-2-days", ...
}

export enum FrequencyClass {
  NONE = 'none',
  DAILY = 'daily',
  WEEKLY = 'weekly',
  MONTHLY = 'monthly',
  CUSTOM = 'custom',
}

export interface RecurrenceSpec {
  frequencyClass: FrequencyClass;
  intervalMinutes: number;
}

export type FunctionArgs = Record<string, unknown>;

export interface FunctionCallRequest {
  name: string;
  args: FunctionArgs;
}

export type CallStatus = 'success' | 'error';

export interface FunctionCallResult {
  readonly status: CallStatus;
  readonly message: string;
  readonly payload?: Readonly<Record<string, unknown>>;
}

export interface DispatchedCall {
  request: FunctionCallRequest;
  result: FunctionCallResult;
}

export type TurnRole = 'user' | 'assistant';

export interface ConversationTurn {
  role: TurnRole;
  content: string;
}

/**
 * Who the current turn is for. `senderId` is the transport identity (the chat id),
 * `text` the raw inbound message used as extra enrichment input.
 */
export interface UserContext {
  userId: string;
  senderId: string;
  workspaceLinked: boolean;
  text: string;
  now: Date;
}

export function success(message: string, payload?: Record<string, unknown>): FunctionCallResult {
  return payload ? { status: 'success', message, payload } : { status: 'success', message };
}

export function failure(message: string, payload?: Record<string, unknown>): FunctionCallResult {
  return payload ? { status: 'error', message, payload } : { status: 'error', message };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
