export type Listener<T> = (value: T) => void;
export type Unsubscribe = () => void;

/**
 * Minimal typed observer channel. Listeners are called synchronously in
 * subscription order; a listener that throws does not stop the others.
 */
export class Channel<T> {
  private listeners = new Set<Listener<T>>();

  constructor(private readonly onListenerError?: (err: unknown) => void) {}

  subscribe(listener: Listener<T>): Unsubscribe {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  emit(value: T): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(value);
      } catch (err) {
        if (this.onListenerError) this.onListenerError(err);
        else throw err;
      }
    }
  }
}
