/**
 * Listener for published snapshots.
 */
export type StateListener<S> = (state: S) => void;

/**
 * Synchronous publish/subscribe for state snapshots.
 * Listeners run in subscription order; a listener may unsubscribe itself
 * (or others) while being notified.
 */
export class StateEmitter<S> {
  private readonly listeners = new Set<StateListener<S>>();

  /**
   * Registers a listener.
   * @returns Function removing the listener
   */
  subscribe(listener: StateListener<S>): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  emit(state: S): void {
    for (const listener of [...this.listeners]) {
      if (this.listeners.has(listener)) {
        listener(state);
      }
    }
  }

  clear(): void {
    this.listeners.clear();
  }

  get listenerCount(): number {
    return this.listeners.size;
  }
}
