import type { ReasoningClient, ReasoningRequest, ReasoningResult } from '@cadre/agents';

export type ScriptStep = string | Error | ((request: ReasoningRequest) => string | Promise<string>);

/**
 * Reasoning client that replays scripted replies per agent, then falls back
 * to a fixed reply. Every request is recorded.
 */
export class ScriptedReasoningClient implements ReasoningClient {
  readonly calls: ReasoningRequest[] = [];
  private scripts: Map<string, ScriptStep[]> = new Map();

  constructor(private fallback: (request: ReasoningRequest) => string = (request) => `Report from ${request.agentId}`) {}

  script(agentId: string, ...steps: ScriptStep[]): this {
    this.scripts.set(agentId, [...(this.scripts.get(agentId) ?? []), ...steps]);
    return this;
  }

  async invoke(request: ReasoningRequest): Promise<ReasoningResult> {
    this.calls.push(request);
    const step = this.scripts.get(request.agentId)?.shift();

    let text: string;
    if (step === undefined) {
      text = this.fallback(request);
    } else if (step instanceof Error) {
      throw step;
    } else if (typeof step === 'function') {
      text = await step(request);
    } else {
      text = step;
    }

    return {
      text,
      model: request.model,
      usage: { inputTokens: 10, outputTokens: 5, totalTokens: 15, cost: 0 },
    };
  }

  callsFor(agentId: string): ReasoningRequest[] {
    return this.calls.filter((call) => call.agentId === agentId);
  }
}

/**
 * A promise plus its resolver, for holding a scripted reply open
 */
export function deferred<T = void>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
