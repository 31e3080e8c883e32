export { Runner, type RunnerDeps, type RunnerOptions, type ExecuteOptions } from './runner.js';

export { ContextAssembler, type ContextAssemblerOptions, type AssembledPrompt } from './context.js';

export { ReasoningSummarizer } from './summarizer.js';

export {
  LLMClient,
  isTransientStatus,
  parseRetryAfter,
  type LLMClientConfig,
  type LLMMessage,
  type LLMProvider,
  type CompletionOptions,
  type CompletionResponse,
  type UsageSummary,
} from './llm-client.js';
