/**
 * Задача отменена: истек таймаут или исполнитель остановлен до ее запуска
 */
export class TaskCancelledError extends Error {
  constructor(message = 'Task was cancelled') {
    super(message);
    this.name = 'TaskCancelledError';
  }
}

/**
 * Задача отправлена после начала остановки исполнителя
 */
export class ExecutorDisposedError extends Error {
  constructor() {
    super('Executor is disposed, cannot accept new tasks');
    this.name = 'ExecutorDisposedError';
  }
}

export class InvalidTimeoutError extends RangeError {
  constructor(timeoutMs: number) {
    super(`Timeout must be a non-negative finite number, got ${timeoutMs}`);
    this.name = 'InvalidTimeoutError';
  }
}

/**
 * В execute передана функция, вернувшая Promise
 */
export class ValueTaskMisuseError extends TypeError {
  constructor() {
    super(
      'execute() received a Promise, use executeAsync() for asynchronous functions',
    );
    this.name = 'ValueTaskMisuseError';
  }
}
