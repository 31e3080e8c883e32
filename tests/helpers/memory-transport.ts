import type { ChatEvent } from '@cadre/protocol';

import type { ChatTransport } from '../../apps/cadred/src/transports/types.js';

export interface Post {
  channel: string;
  text: string;
}

export class MemoryTransport implements ChatTransport {
  readonly posts: Post[] = [];
  failPosts = false;
  private handler: ((event: ChatEvent) => void) | null = null;

  async start(onMessage: (event: ChatEvent) => void): Promise<void> {
    this.handler = onMessage;
  }

  async post(channel: string, text: string): Promise<void> {
    if (this.failPosts) {
      throw new Error('chat unavailable');
    }
    this.posts.push({ channel, text });
  }

  async stop(): Promise<void> {
    this.handler = null;
  }

  deliver(event: ChatEvent): void {
    if (!this.handler) {
      throw new Error('transport not started');
    }
    this.handler(event);
  }

  postsTo(channel: string): string[] {
    return this.posts.filter((post) => post.channel === channel).map((post) => post.text);
  }
}
