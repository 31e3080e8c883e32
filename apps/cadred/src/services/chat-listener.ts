import type { ChatEvent, Task } from '@cadre/protocol';
import { createTask } from '@cadre/protocol';
import type { AgentRoster } from '@cadre/core';

import { logger } from '../logger.js';
import type { Dispatcher } from './dispatcher.js';

const MENTION = /(?:^|\s)@([a-z][a-z0-9_]*)/g;

export interface ChatListenerOptions {
  /** Channel whose messages go through routing when nobody is mentioned */
  requestChannel: string;
  /** Channel name to owning agent */
  channelRoutes: Record<string, string>;
}

/**
 * Turns inbound chat messages into human-origin tasks.
 *
 * Targets come from `@agent_id` mentions, then the channel's owning agent.
 * On the request channel with neither, the task is left for routing.
 * Messages on any other channel are ignored.
 */
export class ChatListener {
  constructor(
    private roster: AgentRoster,
    private dispatcher: Pick<Dispatcher, 'enqueue'>,
    private options: ChatListenerOptions,
  ) {}

  toTask(event: ChatEvent): Task | null {
    const text = event.text.trim();
    if (!text) return null;

    const mentions: string[] = [];
    for (const match of text.matchAll(MENTION)) {
      const id = match[1];
      if (id && this.roster.get(id)?.dispatchable && !mentions.includes(id)) {
        mentions.push(id);
      }
    }

    const owner = this.options.channelRoutes[event.channel];
    let targets: string[];
    if (mentions.length > 0) {
      targets = mentions;
    } else if (owner) {
      targets = [owner];
    } else if (event.channel === this.options.requestChannel) {
      targets = [];
    } else {
      return null;
    }

    return createTask({
      origin: { kind: 'human', channel: event.channel, author: event.author, receivedAt: event.timestamp },
      instruction: text,
      targetAgentIds: targets,
      priority: 'high',
      createdAt: event.timestamp,
    });
  }

  handle(event: ChatEvent): Task | null {
    const task = this.toTask(event);
    if (!task) {
      logger.debug({ channel: event.channel }, 'Ignoring chat message');
      return null;
    }

    logger.info({ taskId: task.id, channel: event.channel, targets: task.targetAgentIds }, 'Chat request received');
    this.dispatcher.enqueue(task);
    return task;
  }
}
