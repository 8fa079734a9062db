import type { Bus, Topic, TopicPayloads } from "./bus.js";

type Handlers = { [K in Topic]: Set<(payload: TopicPayloads[K]) => void> };

export class InMemoryBus implements Bus {
  private handlers: Handlers = {
    QUOTES: new Set(),
    POLICIES: new Set(),
    SIMULATIONS: new Set(),
  };

  publish<K extends Topic>(topic: K, payload: TopicPayloads[K]): void {
    for (const h of this.handlers[topic]) h(payload);
  }

  subscribe<K extends Topic>(topic: K, handler: (payload: TopicPayloads[K]) => void): () => void {
    const set: Set<(payload: TopicPayloads[K]) => void> = this.handlers[topic];
    set.add(handler);
    return () => {
      set.delete(handler);
    };
  }
}
