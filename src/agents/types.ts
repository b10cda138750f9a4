export interface CompletionRequest {
  system: string;
  prompt: string;
  temperature: number;
}

export interface CompletionResult {
  text: string;
  stopReason: string | null;
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
}

/** Minimal text-completion surface the agent adapter depends on. */
export interface CompletionClient {
  complete(request: CompletionRequest): Promise<CompletionResult>;
}
