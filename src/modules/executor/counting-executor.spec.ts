import { CountingExecutor, ExecutionCounter } from './counting-executor';
import { ExecutorDisposedError } from './errors/executor.errors';
import { SerialExecutorService } from './serial-executor.service';

describe('CountingExecutor', () => {
  describe('с реальным исполнителем', () => {
    let inner: SerialExecutorService;
    let executor: CountingExecutor;

    beforeEach(() => {
      inner = new SerialExecutorService({
        disposeTimeoutMs: 1000,
        isDebuggerAttached: () => false,
      });
      executor = new CountingExecutor(inner);
    });

    afterEach(async () => {
      await executor.dispose();
    });

    /**
     * Тест: счетчик учитывает задачи независимо от их итога
     */
    it('должен считать все принятые задачи', async () => {
      const outcomes = await Promise.allSettled([
        executor.execute(() => 'ok', 1000),
        executor.execute(() => {
          throw new Error('fail');
        }, 1000),
        executor.execute(() => 'cancelled', 0),
        executor.executeAsync(() => Promise.resolve('async'), 1000),
      ]);

      expect(outcomes.map((outcome) => outcome.status)).toEqual([
        'fulfilled',
        'rejected',
        'rejected',
        'fulfilled',
      ]);
      expect(executor.executionsCount).toBe(4);
      expect(inner.getStats().submitted).toBe(4);
    });

    it('должен увеличивать счетчик сразу после отправки', async () => {
      const promise = executor.execute(() => 'later', 1000);

      expect(executor.executionsCount).toBe(1);
      await expect(promise).resolves.toBe('later');
    });

    it('должен не учитывать задачи, отклоненные после dispose', async () => {
      await executor.dispose();

      expect(() => executor.execute(() => 1, 1000)).toThrow(
        ExecutorDisposedError,
      );
      expect(executor.executionsCount).toBe(0);
      expect(inner.isDisposed()).toBe(true);
    });
  });

  describe('с заглушкой исполнителя', () => {
    const promise = Promise.resolve(1);
    const inner = {
      execute: jest.fn().mockReturnValue(promise),
      executeAsync: jest.fn().mockReturnValue(promise),
      dispose: jest.fn().mockResolvedValue(true),
    };

    beforeEach(() => {
      jest.clearAllMocks();
    });

    it('должен возвращать Promise вложенного исполнителя без изменений', () => {
      const executor = new CountingExecutor(inner);
      const fn = () => 1;
      const asyncFn = () => Promise.resolve(1);

      expect(executor.execute(fn, 250)).toBe(promise);
      expect(executor.executeAsync(asyncFn, 500)).toBe(promise);

      expect(inner.execute).toHaveBeenCalledWith(fn, 250);
      expect(inner.executeAsync).toHaveBeenCalledWith(asyncFn, 500);
      expect(executor.executionsCount).toBe(2);
    });

    it('должен передавать dispose вложенному исполнителю', async () => {
      const executor = new CountingExecutor(inner);

      await expect(executor.dispose(300)).resolves.toBe(true);
      expect(inner.dispose).toHaveBeenCalledWith(300);
    });
  });
});

describe('ExecutionCounter', () => {
  it('должен монотонно увеличиваться', () => {
    const counter = new ExecutionCounter();

    expect(counter.value).toBe(0);
    counter.increment();
    counter.increment();
    expect(counter.value).toBe(2);
  });
});
