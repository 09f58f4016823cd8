import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { performance } from 'node:perf_hooks';
import { CompletionHandle } from './completion-handle';
import { isDebuggerAttached } from './debugger.util';
import {
  ExecutorDisposedError,
  InvalidTimeoutError,
  ValueTaskMisuseError,
} from './errors/executor.errors';
import {
  CompletionState,
  ExecutorOptions,
  ExecutorStats,
  TaskExecutor,
  ValueOnly,
  ValueWorkItem,
  WorkerState,
  WorkItem,
  WorkItemKind,
} from './types/executor.types';
import { WorkQueue } from './work-queue';

/** Максимальная задержка setTimeout, большие значения Node заменяет на 1ms */
const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Таймер отмены одной задачи
 */
class TimeoutGuard {
  private readonly deadline: number;

  private timer: NodeJS.Timeout | undefined;

  constructor(timeoutMs: number, onExpire: () => void) {
    this.deadline = performance.now() + timeoutMs;
    this.schedule(timeoutMs, onExpire);
  }

  /**
   * Срок истек, даже если синхронная задача не дала таймеру сработать
   */
  get expired(): boolean {
    return performance.now() >= this.deadline;
  }

  clear(): void {
    clearTimeout(this.timer);
  }

  private schedule(delayMs: number, onExpire: () => void): void {
    if (delayMs <= MAX_TIMER_DELAY_MS) {
      this.timer = setTimeout(onExpire, delayMs);
      return;
    }

    this.timer = setTimeout(
      () => this.schedule(delayMs - MAX_TIMER_DELAY_MS, onExpire),
      MAX_TIMER_DELAY_MS,
    );
  }
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === 'object' || typeof value === 'function') &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

/**
 * Исполнитель задач на одном выделенном рабочем цикле
 *
 * @description
 * Основные возможности:
 * - Задачи выполняются строго по одной в порядке постановки (FIFO)
 * - Постановка в очередь не блокирует вызывающую сторону
 * - Таймаут на каждую задачу, отключается при подключенном отладчике
 * - Ошибки задачи передаются вызывающей стороне без изменений
 * - Остановка с ограниченным временем ожидания рабочего цикла
 */
@Injectable()
export class SerialExecutorService implements TaskExecutor, OnModuleDestroy {
  private readonly logger = new Logger(SerialExecutorService.name);

  private readonly queue = new WorkQueue<WorkItem<unknown>>();

  /** Рабочий цикл, запускается в конструкторе */
  private readonly loop: Promise<void>;

  /** Флаг остановки рабочего цикла */
  private mustStop = false;

  private state: WorkerState = WorkerState.IDLE;

  /** Результат первого вызова dispose, повторные вызовы получают его же */
  private disposing: Promise<boolean> | undefined;

  private nextId = 0;

  private stats: Omit<ExecutorStats, 'pending' | 'running'> = {
    submitted: 0,
    completed: 0,
    failed: 0,
    cancelled: 0,
  };

  private readonly debuggerCheck: () => boolean;

  /**
   * @param options - Время ожидания при остановке и проверка отладчика
   */
  constructor(private readonly options: ExecutorOptions) {
    this.debuggerCheck = options.isDebuggerAttached ?? isDebuggerAttached;

    this.loop = this.run().catch((error: unknown) => {
      this.logger.error('Worker loop terminated unexpectedly', error);
    });

    this.logger.log(
      `Executor initialized with dispose timeout: ${options.disposeTimeoutMs}ms`,
    );
  }

  /**
   * Ставит в очередь функцию, возвращающую значение
   *
   * @param fn - Функция для выполнения на рабочем цикле
   * @param timeoutMs - Таймаут выполнения, 0 означает немедленное истечение
   * @returns Promise с результатом функции
   * @throws InvalidTimeoutError если таймаут отрицательный
   * @throws ExecutorDisposedError если исполнитель уже останавливается
   *
   * @description
   * Функция, возвращающая Promise, не компилируется (см. ValueOnly).
   * Если такая все же попала сюда через any, задача завершается
   * ValueTaskMisuseError, а не результатом-Promise
   *
   * @example
   * ```typescript
   * const total = await executor.execute(() => ledger.sum(), 1000);
   * ```
   */
  execute<T>(
    fn: () => T,
    timeoutMs: number,
    ..._valueOnly: ValueOnly<T>
  ): Promise<T> {
    const handle = new CompletionHandle<T>();
    this.submit({
      id: this.assertAccepting(timeoutMs),
      kind: WorkItemKind.VALUE,
      fn,
      timeoutMs,
      handle,
    });

    return handle.promise;
  }

  /**
   * Ставит в очередь асинхронную функцию и возвращает результат ее Promise
   *
   * @example
   * ```typescript
   * const rows = await executor.executeAsync(() => connection.query(sql), 5000);
   * ```
   */
  executeAsync<T>(fn: () => PromiseLike<T>, timeoutMs: number): Promise<T> {
    const handle = new CompletionHandle<T>();
    this.submit({
      id: this.assertAccepting(timeoutMs),
      kind: WorkItemKind.ASYNC,
      fn,
      timeoutMs,
      handle,
    });

    return handle.promise;
  }

  /**
   * Останавливает рабочий цикл
   *
   * @param graceTimeoutMs - Сколько ждать выхода рабочего цикла
   * @returns true если цикл завершился, false если время ожидания истекло
   *
   * @description
   * Процесс остановки:
   * 1. Устанавливает флаг остановки (новые задачи отклоняются)
   * 2. Будит рабочий цикл, если он ждет на пустой очереди
   * 3. Ждет завершения текущей задачи не дольше graceTimeoutMs
   * 4. Задачи, оставшиеся в очереди, отменяются
   *
   * Если время ожидания истекло, выполняющаяся задача не прерывается:
   * цикл завершится сам после нее, а вызов вернет false.
   */
  dispose(graceTimeoutMs = this.options.disposeTimeoutMs): Promise<boolean> {
    if (!this.disposing) {
      this.disposing = this.stop(graceTimeoutMs);
    }

    return this.disposing;
  }

  async onModuleDestroy(): Promise<void> {
    await this.dispose();
  }

  /**
   * Возвращает копию статистики исполнителя
   */
  getStats(): ExecutorStats {
    return {
      ...this.stats,
      pending: this.queue.size,
      running: this.state === WorkerState.EXECUTING ? 1 : 0,
    };
  }

  getState(): WorkerState {
    if (this.mustStop && this.state !== WorkerState.STOPPED) {
      return WorkerState.STOPPING;
    }

    return this.state;
  }

  isDisposed(): boolean {
    return this.mustStop;
  }

  /**
   * Проверяет таймаут и флаг остановки
   *
   * @returns Порядковый номер новой задачи
   */
  private assertAccepting(timeoutMs: number): number {
    if (!Number.isFinite(timeoutMs) || timeoutMs < 0) {
      throw new InvalidTimeoutError(timeoutMs);
    }

    if (this.mustStop) {
      throw new ExecutorDisposedError();
    }

    return ++this.nextId;
  }

  /**
   * Добавляет задачу в очередь и учитывает ее в статистике
   */
  private submit(item: WorkItem<unknown>): void {
    this.queue.enqueue(item);
    this.stats.submitted++;

    this.logger.debug(
      `Task #${item.id} enqueued: kind=${item.kind}, pending=${this.queue.size}`,
    );
  }

  /**
   * Рабочий цикл
   *
   * @description
   * Берет задачи из очереди по одной и выполняет их до установки флага
   * остановки. Пустой результат take() означает пробуждение через interrupt.
   * После выхода отменяет задачи, оставшиеся в очереди
   */
  private async run(): Promise<void> {
    while (!this.mustStop) {
      this.state = WorkerState.IDLE;

      const item = await this.queue.take();
      if (!item) {
        continue;
      }

      this.state = WorkerState.EXECUTING;
      await this.runItem(item);
    }

    this.state = WorkerState.STOPPED;
    this.cancelPending();
  }

  /**
   * Выполняет одну задачу под таймаутом
   *
   * @description
   * Ошибка задачи передается вызывающей стороне и не прерывает цикл.
   * Таймер снимается при любом исходе
   */
  private async runItem<T>(item: WorkItem<T>): Promise<void> {
    const guard = this.armTimeout(item);

    this.logger.debug(
      `Task #${item.id} started: timeout=${guard ? `${item.timeoutMs}ms` : 'suppressed'}`,
    );

    try {
      if (item.kind === WorkItemKind.VALUE) {
        this.settleResult(item, guard, this.invokeValue(item));
      } else {
        await item.fn().then((value) => this.settleResult(item, guard, value));
      }
    } catch (error) {
      this.settleError(item, guard, error);
    } finally {
      guard?.clear();
    }
  }

  /**
   * Вызывает функцию синхронной задачи
   *
   * @throws ValueTaskMisuseError если функция вернула Promise
   */
  private invokeValue<T>(item: ValueWorkItem<T>): T {
    const value = item.fn();

    if (isPromiseLike(value)) {
      value.then(undefined, (error: unknown) =>
        this.logger.warn(
          `Task #${item.id}: Promise returned to execute() rejected: ${String(error)}`,
        ),
      );
      throw new ValueTaskMisuseError();
    }

    return value;
  }

  /**
   * Взводит таймер отмены, если отладчик не подключен
   */
  private armTimeout<T>(item: WorkItem<T>): TimeoutGuard | undefined {
    if (this.debuggerCheck()) {
      return undefined;
    }

    return new TimeoutGuard(item.timeoutMs, () => this.cancelOnTimeout(item));
  }

  /**
   * Передает результат задачи
   *
   * @description
   * Если срок уже истек, первой срабатывает отмена, как если бы таймер
   * успел сработать во время синхронной работы
   */
  private settleResult<T>(
    item: WorkItem<T>,
    guard: TimeoutGuard | undefined,
    value: T,
  ): void {
    if (guard?.expired) {
      this.cancelOnTimeout(item);
    }
    item.handle.trySetResult(value);
    this.finish(item);
  }

  /**
   * Передает ошибку задачи без изменений
   */
  private settleError<T>(
    item: WorkItem<T>,
    guard: TimeoutGuard | undefined,
    error: unknown,
  ): void {
    if (guard?.expired) {
      this.cancelOnTimeout(item);
    }
    if (item.handle.trySetError(error)) {
      this.logger.error(`Task #${item.id} failed`, error);
    }
    this.finish(item);
  }

  /**
   * Отменяет задачу по истечении таймаута
   */
  private cancelOnTimeout<T>(item: WorkItem<T>): void {
    const reason = `Task timed out after ${item.timeoutMs}ms`;

    if (item.handle.trySetCancelled(reason)) {
      this.logger.warn(`Task #${item.id}: ${reason}`);
    }
  }

  /**
   * Учитывает итог задачи и возвращает цикл в IDLE
   *
   * @description
   * Вызывается синхронно сразу после передачи итога, до того как
   * вызывающая сторона продолжит после await
   */
  private finish<T>(item: WorkItem<T>): void {
    switch (item.handle.state) {
      case CompletionState.RESOLVED:
        this.stats.completed++;
        this.logger.debug(`Task #${item.id} completed`);
        break;
      case CompletionState.FAILED:
        this.stats.failed++;
        break;
      case CompletionState.CANCELLED:
        this.stats.cancelled++;
        break;
      case CompletionState.PENDING:
        break;
    }

    this.state = WorkerState.IDLE;
  }

  /**
   * Отменяет задачи, оставшиеся в очереди после выхода цикла
   */
  private cancelPending(): void {
    const remaining = this.queue.drain();

    for (const item of remaining) {
      item.handle.trySetCancelled('Executor disposed before task started');
    }

    if (remaining.length > 0) {
      this.stats.cancelled += remaining.length;
      this.logger.log(`Cancelled ${remaining.length} pending tasks`);
    }
  }

  /**
   * Останавливает цикл и ждет его выхода не дольше graceTimeoutMs
   *
   * @returns false если время ожидания истекло
   */
  private async stop(graceTimeoutMs: number): Promise<boolean> {
    this.logger.log('Dispose initiated...');
    this.mustStop = true;
    this.queue.interrupt();

    let timer: NodeJS.Timeout | undefined;
    const exited = await Promise.race([
      this.loop.then(() => true),
      new Promise<boolean>((resolve) => {
        timer = setTimeout(() => resolve(false), graceTimeoutMs);
      }),
    ]);
    clearTimeout(timer);

    if (!exited) {
      this.logger.warn(
        `Worker did not stop within ${graceTimeoutMs}ms, abandoning it`,
      );
      return false;
    }

    this.logger.log('Dispose completed');
    return true;
  }
}
