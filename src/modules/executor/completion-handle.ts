import { TaskCancelledError } from './errors/executor.errors';
import { CompletionState } from './types/executor.types';

interface PromiseSettlers<T> {
  resolve(value: T): void;
  reject(reason: unknown): void;
}

/**
 * Обработчик результата задачи с однократным присваиванием
 *
 * @description
 * Из состояния PENDING возможен ровно один переход: в RESOLVED, FAILED или
 * CANCELLED. Первая успешная попытка фиксирует результат, все последующие
 * игнорируются. Таймер таймаута и рабочий цикл вызывают эти методы
 * независимо друг от друга.
 *
 * @example
 * ```typescript
 * const handle = new CompletionHandle<number>();
 * handle.trySetResult(42); // true
 * handle.trySetCancelled('late'); // false
 * await handle.promise; // 42
 * ```
 */
export class CompletionHandle<T> {
  /** Promise, который получает вызывающая сторона */
  readonly promise: Promise<T>;

  private currentState: CompletionState = CompletionState.PENDING;

  private readonly settlers: PromiseSettlers<T>;

  constructor() {
    let settlers: PromiseSettlers<T> = {
      resolve: () => undefined,
      reject: () => undefined,
    };

    this.promise = new Promise<T>((resolve, reject) => {
      settlers = { resolve, reject };
    });

    this.settlers = settlers;
  }

  get state(): CompletionState {
    return this.currentState;
  }

  get isCompleted(): boolean {
    return this.currentState !== CompletionState.PENDING;
  }

  /**
   * @returns true если результат был зафиксирован этим вызовом
   */
  trySetResult(value: T): boolean {
    if (!this.transition(CompletionState.RESOLVED)) {
      return false;
    }

    this.settlers.resolve(value);
    return true;
  }

  /**
   * Фиксирует ошибку без изменений, вызывающая сторона получит тот же объект
   */
  trySetError(error: unknown): boolean {
    if (!this.transition(CompletionState.FAILED)) {
      return false;
    }

    this.settlers.reject(error);
    return true;
  }

  trySetCancelled(reason?: string): boolean {
    if (!this.transition(CompletionState.CANCELLED)) {
      return false;
    }

    this.settlers.reject(new TaskCancelledError(reason));
    return true;
  }

  private transition(next: CompletionState): boolean {
    if (this.currentState !== CompletionState.PENDING) {
      return false;
    }

    this.currentState = next;
    return true;
  }
}
