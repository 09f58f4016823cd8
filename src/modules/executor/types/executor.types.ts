import type { CompletionHandle } from '../completion-handle';

/**
 * Вид элемента работы, фиксируется при постановке в очередь
 */
export enum WorkItemKind {
  /** Функция сразу возвращает значение */
  VALUE = 'VALUE',
  /** Функция возвращает Promise, результат которого нужно дождаться */
  ASYNC = 'ASYNC',
}

/**
 * Состояния обработчика результата
 */
export enum CompletionState {
  PENDING = 'PENDING',
  RESOLVED = 'RESOLVED',
  FAILED = 'FAILED',
  CANCELLED = 'CANCELLED',
}

/**
 * Состояния рабочего цикла
 */
export enum WorkerState {
  /** Ожидает задачу на пустой очереди */
  IDLE = 'IDLE',
  /** Выполняет одну задачу */
  EXECUTING = 'EXECUTING',
  /** Получен флаг остановки */
  STOPPING = 'STOPPING',
  /** Цикл завершен */
  STOPPED = 'STOPPED',
}

interface WorkItemBase<T> {
  /** Порядковый номер задачи в исполнителе */
  readonly id: number;
  /** Таймаут выполнения в миллисекундах */
  readonly timeoutMs: number;
  /** Обработчик результата, создается при постановке в очередь */
  readonly handle: CompletionHandle<T>;
}

export interface ValueWorkItem<T> extends WorkItemBase<T> {
  readonly kind: WorkItemKind.VALUE;
  readonly fn: () => T;
}

export interface AsyncWorkItem<T> extends WorkItemBase<T> {
  readonly kind: WorkItemKind.ASYNC;
  readonly fn: () => PromiseLike<T>;
}

/**
 * Элемент очереди: функция, таймаут и обработчик результата
 */
export type WorkItem<T> = ValueWorkItem<T> | AsyncWorkItem<T>;

/**
 * Дополнительный аргумент execute, который нельзя передать, если функция
 * возвращает Promise: такие функции ставятся через executeAsync
 *
 * @example
 * ```typescript
 * executor.execute(() => fetchRows(), 1000);
 * // Expected 3 arguments, but got 2. An argument for 'useExecuteAsync' was not provided.
 * ```
 */
export type ValueOnly<T> = 0 extends 1 & T
  ? []
  : [T] extends [never]
    ? []
    : [T] extends [PromiseLike<unknown>]
      ? [useExecuteAsync: never]
      : [];

/**
 * Исполнитель задач с фиксированной моделью выполнения
 */
export interface TaskExecutor {
  /**
   * Ставит в очередь функцию, возвращающую значение
   *
   * @description
   * Рабочий цикл не ждет возвращенное значение. Функции, возвращающие
   * Promise, отклоняются компилятором и ставятся через executeAsync
   *
   * @param fn - Функция для выполнения
   * @param timeoutMs - Таймаут выполнения (>= 0)
   * @returns Promise с результатом функции
   */
  execute<T>(
    fn: () => T,
    timeoutMs: number,
    ...valueOnly: ValueOnly<T>
  ): Promise<T>;

  /**
   * Ставит в очередь асинхронную функцию
   *
   * @param fn - Функция, возвращающая Promise
   * @param timeoutMs - Таймаут выполнения (>= 0)
   * @returns Promise с результатом внутреннего Promise
   */
  executeAsync<T>(fn: () => PromiseLike<T>, timeoutMs: number): Promise<T>;

  /**
   * Останавливает исполнитель
   *
   * @param graceTimeoutMs - Сколько ждать завершения рабочего цикла
   * @returns true если цикл завершился в отведенное время
   */
  dispose(graceTimeoutMs?: number): Promise<boolean>;
}

/**
 * Параметры исполнителя
 */
export interface ExecutorOptions {
  /** Время ожидания завершения рабочего цикла при dispose */
  disposeTimeoutMs: number;
  /**
   * Отключает таймауты, когда возвращает true. По умолчанию проверяет,
   * открыт ли инспектор node:inspector: запуск с --inspect без клиента
   * тоже отключает таймауты
   */
  isDebuggerAttached?: () => boolean;
}

/**
 * Статистика исполнителя
 */
export interface ExecutorStats {
  /** Количество принятых задач */
  submitted: number;
  /** Количество успешно завершенных задач */
  completed: number;
  /** Количество задач, завершившихся с ошибкой */
  failed: number;
  /** Количество отмененных задач (таймаут или остановка) */
  cancelled: number;
  /** Количество задач в очереди ожидания */
  pending: number;
  /** Количество выполняющихся задач (0 или 1) */
  running: number;
}
