// In-process pub/sub with group join/leave semantics.

import { logger } from '../utils/logger';
import type { EventMessage, PubSubTransport } from './events';

const log = logger.child({ module: 'hub' });

export interface Subscriber {
  readonly id: string;
  send(payload: string): void;
}

export class PubSubHub implements PubSubTransport {
  private readonly topics = new Map<string, Set<Subscriber>>();

  join(topic: string, subscriber: Subscriber): void {
    let members = this.topics.get(topic);
    if (!members) {
      members = new Set();
      this.topics.set(topic, members);
    }
    members.add(subscriber);
    log.debug({ topic, subscriber: subscriber.id, members: members.size }, 'Subscriber joined');
  }

  leave(topic: string, subscriber: Subscriber): void {
    const members = this.topics.get(topic);
    if (!members) return;
    members.delete(subscriber);
    if (members.size === 0) this.topics.delete(topic);
  }

  leaveAll(subscriber: Subscriber): void {
    for (const topic of [...this.topics.keys()]) {
      this.leave(topic, subscriber);
    }
  }

  subscriberCount(topic?: string): number {
    if (topic !== undefined) return this.topics.get(topic)?.size ?? 0;
    const unique = new Set<Subscriber>();
    for (const members of this.topics.values()) {
      for (const m of members) unique.add(m);
    }
    return unique.size;
  }

  publish(topic: string, message: EventMessage): number {
    const members = this.topics.get(topic);
    if (!members || members.size === 0) return 0;

    const payload = JSON.stringify(message);
    let delivered = 0;
    const broken: Subscriber[] = [];

    for (const subscriber of members) {
      try {
        subscriber.send(payload);
        delivered++;
      } catch (err) {
        log.warn({ topic, subscriber: subscriber.id, err }, 'Send failed, dropping subscriber');
        broken.push(subscriber);
      }
    }

    for (const subscriber of broken) this.leaveAll(subscriber);
    return delivered;
  }
}
