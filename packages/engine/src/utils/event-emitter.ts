type EventMap = Record<string, unknown[]>;

export type Listener<Args extends unknown[]> = (...args: Args) => void;

/**
 * Minimal typed emitter. `Events` maps each event name to its argument
 * tuple, so `emit` and `on` agree on payloads.
 */
export class EventEmitter<Events extends EventMap> {
  private events: {
    [E in keyof Events]?: Array<Listener<Events[E]>>;
  } = {};

  public on<E extends keyof Events>(event: E, listener: Listener<Events[E]>): this {
    const listeners = this.events[event] ?? [];
    listeners.push(listener);
    this.events[event] = listeners;
    return this;
  }

  public off<E extends keyof Events>(event: E, listener: Listener<Events[E]>): this {
    const listeners = this.events[event];
    if (!listeners) return this;
    const index = listeners.indexOf(listener);
    if (index !== -1) {
      listeners.splice(index, 1);
    }
    return this;
  }

  public once<E extends keyof Events>(event: E, listener: Listener<Events[E]>): this {
    const onceWrapper: Listener<Events[E]> = (...args) => {
      this.off(event, onceWrapper);
      listener(...args);
    };
    return this.on(event, onceWrapper);
  }

  public emit<E extends keyof Events>(event: E, ...args: Events[E]): boolean {
    const listeners = this.events[event];
    if (!listeners || listeners.length === 0) return false;
    for (const listener of [...listeners]) {
      listener(...args);
    }
    return true;
  }

  public listenerCount<E extends keyof Events>(event: E): number {
    return this.events[event]?.length ?? 0;
  }
}
