export { buildContractSpecification, generateDeterministicHash, isContractSpecification } from './contracts/definition.js';
export { loadContractFile } from './contracts/loader.js';
export { contractSpecificationSchema } from './contracts/schema.js';
export type { ContractSpecificationInput } from './contracts/schema.js';
export { ContractSpecificationError, DEFAULT_BEHAVIOR_KEY, getBehaviorKey } from './contracts/types.js';
export type {
  BehavioralFlags,
  ContractIssue,
  ContractPolicy,
  ContractSpecification,
  EscalationPolicy,
  HealthPolicy,
  ResponseContract,
  TemperatureControl,
  TemperatureMode,
} from './contracts/types.js';

export { ContractEnforcer, UNHEALTHY_REASON } from './enforcement/enforcer.js';
export type { ContractEnforcerOptions, EnforcementResult } from './enforcement/enforcer.js';
export type { AttemptRecord, EnforcementPath, EnforcementTrace } from './enforcement/trace.js';

export { ResponseValidator, DECISION_CHANGED_REASON } from './validation/validator.js';
export type { ValidationFailureCode, ValidationResult, ValidationTiming } from './validation/validator.js';
export { normalizeResponse, UNPARSEABLE_RESPONSE } from './validation/normalize.js';
export { SuspiciousBehaviorDetector } from './suspicion/detector.js';
export type { SuspicionRule, SuspicionVerdict } from './suspicion/detector.js';
export { HealthMonitor } from './health/monitor.js';
export type { HealthSnapshot, Strike } from './health/monitor.js';
export type { HealthStatus, HealthTransition } from './health/states.js';
export { TemperatureController, DEFAULT_TEMPERATURE_STEP } from './temperature/controller.js';

export { Escalator } from './escalation/escalator.js';
export {
  FanOutEscalationSink,
  InMemoryEscalationSink,
  LoggerEscalationSink,
  RedisEscalationSink,
} from './escalation/sinks.js';
export type { EscalationListClient } from './escalation/sinks.js';
export { DEFAULT_ESCALATION_ACTION, resolveEscalationAction } from './escalation/types.js';
export type { EscalationEvent, EscalationReason, EscalationSink } from './escalation/types.js';

export { ClaudeClient } from './agents/claude-client.js';
export { createAnthropicAgent } from './agents/anthropic-agent.js';
export type { CompletionClient, CompletionRequest, CompletionResult } from './agents/types.js';

export { logger } from './observability/logger.js';
export type { AgentCall, AgentCallOptions, AgentResponse, CallArguments, CallContext, MemoryEntry } from './types.js';
