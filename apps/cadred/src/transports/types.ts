import type { ChatEvent } from '@cadre/protocol';

/**
 * Chat surface the orchestrator listens on and posts to
 */
export interface ChatTransport {
  start(onMessage: (event: ChatEvent) => void): Promise<void>;
  post(channel: string, text: string): Promise<void>;
  stop(): Promise<void>;
}

export type ChatPoster = Pick<ChatTransport, 'post'>;
