import type { ModelTier, TokenUsage } from '@cadre/protocol';

/**
 * One reasoning call made on behalf of an agent
 */
export interface ReasoningRequest {
  agentId: string;
  model: string;
  system: string;
  prompt: string;
  maxTokens?: number;
}

export interface ReasoningResult {
  text: string;
  usage: TokenUsage;
  model: string;
}

/**
 * Reasoning service seam. Implementations throw TransientExternalError or
 * PermanentExternalError; anything else is treated as permanent.
 */
export interface ReasoningClient {
  invoke(request: ReasoningRequest): Promise<ReasoningResult>;
}

/**
 * Read-only access to reference documents. Errors are classified the same way
 * as reasoning errors.
 */
export interface DocumentStore {
  fetch(ref: string): Promise<Buffer>;
  list(folder: string): Promise<string[]>;
}

export type ModelTable = Record<ModelTier, string>;

/**
 * Project-wide material some agents receive with every run
 */
export interface SharedContext {
  docs?: string;
  priorities?: string;
}
