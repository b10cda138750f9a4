export type HealthStatus = 'healthy' | 'unhealthy';

export interface HealthStateMetadata {
  status: HealthStatus;
  acceptsCalls: boolean;
  description: string;
}

const STATE_DEFINITIONS: Record<HealthStatus, Omit<HealthStateMetadata, 'status'>> = {
  healthy: {
    acceptsCalls: true,
    description: 'Strikes inside the window are below the limit; the agent is called',
  },
  unhealthy: {
    acceptsCalls: false,
    description: 'Strike limit reached; calls short-circuit to the fallback until reset',
  },
};

export interface HealthTransition {
  from: HealthStatus;
  to: HealthStatus;
  reason: string;
  timestamp: string;
}

export function getHealthStateMetadata(status: HealthStatus): HealthStateMetadata {
  return { status, ...STATE_DEFINITIONS[status] };
}

export function acceptsCalls(status: HealthStatus): boolean {
  return STATE_DEFINITIONS[status].acceptsCalls;
}

export function deriveStatus(strikeCount: number, maxStrikes: number): HealthStatus {
  return strikeCount >= maxStrikes ? 'unhealthy' : 'healthy';
}
