/** One agent output: an open field → value map. */
export type AgentResponse = Record<string, unknown>;

export interface MemoryEntry {
  analysis: Record<string, unknown>;
}

export interface CallContext {
  memory?: readonly MemoryEntry[];
  pattern_history?: readonly string[];
  context_suggestion?: string;
  indicators?: Record<string, unknown>;
}

/**
 * Arguments of one enforced call. `context`, `memory` and `indicators` are
 * read by the enforcer; everything else is handed to the agent as is.
 */
export interface CallArguments {
  context?: CallContext;
  memory?: readonly MemoryEntry[];
  indicators?: Record<string, unknown>;
  [key: string]: unknown;
}

export interface AgentCallOptions {
  temperature: number;
  attempt: number;
}

/**
 * The wrapped agent. Agents that do not declare `options` are called the
 * same way and simply never see the temperature.
 */
export type AgentCall<TArgs extends CallArguments = CallArguments> = (
  args: TArgs,
  options: AgentCallOptions
) => unknown;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function resolveCallContext(args: CallArguments): CallContext {
  const base: CallContext = isRecord(args.context) ? args.context : {};
  return {
    ...base,
    memory: base.memory ?? args.memory,
    indicators: base.indicators ?? args.indicators,
  };
}
