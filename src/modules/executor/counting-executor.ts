import { TaskExecutor, ValueOnly } from './types/executor.types';

/**
 * Монотонный счетчик
 */
export class ExecutionCounter {
  private current = 0;

  get value(): number {
    return this.current;
  }

  increment(): void {
    this.current++;
  }
}

/**
 * Декоратор исполнителя, считающий принятые задачи
 *
 * @description
 * Счетчик увеличивается сразу после того, как вложенный исполнитель принял
 * задачу, независимо от ее результата. Задача, отклоненная синхронно
 * (например, после dispose), не учитывается.
 *
 * @example
 * ```typescript
 * const executor = new CountingExecutor(new SerialExecutorService(options));
 * await executor.execute(() => 1, 1000);
 * executor.executionsCount; // 1
 * ```
 */
export class CountingExecutor implements TaskExecutor {
  private readonly executionCounter = new ExecutionCounter();

  constructor(private readonly inner: TaskExecutor) {}

  get executionsCount(): number {
    return this.executionCounter.value;
  }

  execute<T>(
    fn: () => T,
    timeoutMs: number,
    ...valueOnly: ValueOnly<T>
  ): Promise<T> {
    const result = this.inner.execute(fn, timeoutMs, ...valueOnly);
    this.executionCounter.increment();

    return result;
  }

  executeAsync<T>(fn: () => PromiseLike<T>, timeoutMs: number): Promise<T> {
    const result = this.inner.executeAsync(fn, timeoutMs);
    this.executionCounter.increment();

    return result;
  }

  dispose(graceTimeoutMs?: number): Promise<boolean> {
    return this.inner.dispose(graceTimeoutMs);
  }
}
