export interface SessionObserver {
  onBoardChanged?(): void;
  onChatChanged?(): void;
  onScoreChanged?(): void;
  onReturnToMenu?(): void;
}

export type SessionSignal = keyof SessionObserver;

/**
 * Parameterless "refresh yourself" signals. Observers are called in
 * registration order and pull whatever state they need afterwards.
 */
export class NotificationBus {
  private observers: SessionObserver[] = [];

  constructor(initial: Iterable<SessionObserver> = []) {
    for (const o of initial) this.observers.push(o);
  }

  subscribe(observer: SessionObserver): () => void {
    this.observers.push(observer);
    return () => {
      this.observers = this.observers.filter((o) => o !== observer);
    };
  }

  emit(signal: SessionSignal): void {
    // Snapshot so an observer that unsubscribes mid-delivery doesn't skip its neighbour.
    for (const observer of this.observers.slice()) {
      const cb = observer[signal];
      if (!cb) continue;
      try {
        cb.call(observer);
      } catch (err) {
        // eslint-disable-next-line no-console
        console.error(`[checkers-session] ${signal} observer error`, err);
      }
    }
  }
}
