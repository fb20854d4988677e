export type Unsubscribe = () => void;

/**
 * Minimal synchronous event bus.
 *
 * - Never throws to callers (subscriber errors are swallowed)
 * - Preserves emission order for each subscriber
 * - One bus per game; nothing here is process-global
 */
export class EventBus<TEvent> {
  private subscribers: Set<(event: TEvent) => void> = new Set();

  subscribe(cb: (event: TEvent) => void): Unsubscribe {
    this.subscribers.add(cb);
    return () => {
      this.subscribers.delete(cb);
    };
  }

  emit(event: TEvent): void {
    for (const sub of this.subscribers) {
      try {
        sub(event);
      } catch {
        // A failing logger must not take the game down with it.
      }
    }
  }
}
