type EventMap = Record<string, unknown[]>;
type Listener<Args extends unknown[]> = (...args: Args) => void;

/**
 * Typed publish/subscribe. Every Simulation owns one; the app-wide
 * `eventBus` instance carries host telemetry (fps, counters) to the UI.
 */
export class EventBus<Events extends EventMap = EventMap> {
  private listeners: { [K in keyof Events]?: Listener<Events[K]>[] } = {};

  public on<K extends keyof Events>(event: K, listener: Listener<Events[K]>): () => void {
    const list = this.listeners[event] ?? [];
    list.push(listener);
    this.listeners[event] = list;

    // Vrací funkci pro odhlášení
    return () => {
      this.off(event, listener);
    };
  }

  public off<K extends keyof Events>(event: K, listener: Listener<Events[K]>): void {
    const list = this.listeners[event];
    if (!list) {
      return;
    }
    this.listeners[event] = list.filter((l) => l !== listener);
  }

  public emit<K extends keyof Events>(event: K, ...args: Events[K]): void {
    const list = this.listeners[event];
    if (!list) {
      return;
    }
    list.forEach((listener) => {
      listener(...args);
    });
  }

  public clear(): void {
    this.listeners = {};
  }
}

export type HostEvents = {
  update: [dt: number];
  entityCount: [count: number];
  tickMs: [ms: number];
};

export const eventBus = new EventBus<HostEvents>();
