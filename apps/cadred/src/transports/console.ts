import { createInterface, type Interface } from 'readline';

import type { ChatEvent } from '@cadre/protocol';

import type { ChatTransport } from './types.js';

/**
 * Terminal transport. A line starting with `#channel` is posted to that
 * channel; anything else goes to the default channel.
 */
export class ConsoleTransport implements ChatTransport {
  private rl: Interface | null = null;

  constructor(
    private defaultChannel: string,
    private author: string = process.env.USER ?? 'operator',
  ) {}

  async start(onMessage: (event: ChatEvent) => void): Promise<void> {
    this.rl = createInterface({ input: process.stdin, terminal: false });
    this.rl.on('line', (line) => {
      const match = /^#([\w-]+)\s+(.*)$/.exec(line.trim());
      onMessage({
        channel: match?.[1] ?? this.defaultChannel,
        author: this.author,
        text: match?.[2] ?? line,
        timestamp: new Date(),
      });
    });
  }

  async post(channel: string, text: string): Promise<void> {
    process.stdout.write(`\n[#${channel}]\n${text}\n`);
  }

  async stop(): Promise<void> {
    this.rl?.close();
    this.rl = null;
  }
}
