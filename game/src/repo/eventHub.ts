import { Subject } from 'rxjs';
import type { Unsubscribe } from './types.js';

export type EventSubjects<TMap extends Record<keyof TMap, unknown[]>> = {
  [K in keyof TMap]: Subject<TMap[K]>;
};

/**
 * Synchronous broadcast, one subject per event name. Listeners run in the
 * order they subscribed, inside the emitter's call stack.
 */
export class EventHub<TMap extends Record<keyof TMap, unknown[]>> {
  constructor(private readonly subjects: EventSubjects<TMap>) {}

  on<K extends keyof TMap>(name: K, listener: (...args: TMap[K]) => void): Unsubscribe {
    const subscription = this.subjects[name].subscribe((args) => listener(...args));
    return () => subscription.unsubscribe();
  }

  emit<K extends keyof TMap>(name: K, ...args: TMap[K]): void {
    this.subjects[name].next(args);
  }

  dispose(): void {
    for (const name in this.subjects) {
      this.subjects[name].complete();
    }
  }
}
