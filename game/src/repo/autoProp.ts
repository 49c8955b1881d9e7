import { BehaviorSubject, skip, type Observable } from 'rxjs';
import type { EqualityComparer, Unsubscribe } from './types.js';

export type AutoPropListener<T> = (value: T) => void;

/** Read-only side of an observable property. */
export interface IAutoProp<T> {
  readonly value: T;
  readonly isCompleted: boolean;
  /** Calls `listener` with the current value right away, then on every change. */
  sync(listener: AutoPropListener<T>): Unsubscribe;
  changed(listener: AutoPropListener<T>): Unsubscribe;
  completed(listener: () => void): Unsubscribe;
  asObservable(): Observable<T>;
}

/**
 * Current value plus subscribers. Setting an equal value is a no-op, and once
 * completed the property keeps its last value and drops every subscriber.
 */
export class AutoProp<T> implements IAutoProp<T> {
  private readonly subject: BehaviorSubject<T>;
  private isDone = false;

  constructor(
    initialValue: T,
    private readonly equals: EqualityComparer<T> = Object.is
  ) {
    this.subject = new BehaviorSubject(initialValue);
  }

  get value(): T {
    return this.subject.getValue();
  }

  get isCompleted(): boolean {
    return this.isDone;
  }

  sync(listener: AutoPropListener<T>): Unsubscribe {
    const subscription = this.subject.subscribe(listener);
    return () => subscription.unsubscribe();
  }

  changed(listener: AutoPropListener<T>): Unsubscribe {
    const subscription = this.subject.pipe(skip(1)).subscribe(listener);
    return () => subscription.unsubscribe();
  }

  completed(listener: () => void): Unsubscribe {
    const subscription = this.subject.subscribe({ complete: listener });
    return () => subscription.unsubscribe();
  }

  asObservable(): Observable<T> {
    return this.subject.asObservable();
  }

  onNext(value: T): void {
    if (this.isCompleted || this.equals(this.subject.getValue(), value)) {
      return;
    }

    this.subject.next(value);
  }

  onCompleted(): void {
    if (this.isCompleted) {
      return;
    }

    this.isDone = true;
    this.subject.complete();
  }

  dispose(): void {
    this.onCompleted();
  }
}
