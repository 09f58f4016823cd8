/**
 * FIFO очередь с одним потребителем и сигналом пробуждения
 *
 * @description
 * Производители вызывают enqueue из любого места, потребитель (рабочий цикл)
 * забирает элементы через take. Проверка пустоты и регистрация ожидания
 * выполняются в одном синхронном шаге, поэтому сигнал от enqueue не теряется.
 */
export class WorkQueue<T> {
  private readonly items: T[] = [];

  /** Пробуждение ожидающего потребителя, если он есть */
  private wakeConsumer: (() => void) | undefined;

  get size(): number {
    return this.items.length;
  }

  /**
   * Добавляет элемент в конец очереди
   *
   * Будит потребителя, если очередь перешла из пустого состояния в непустое
   */
  enqueue(item: T): void {
    this.items.push(item);

    if (this.items.length === 1) {
      this.signal();
    }
  }

  /**
   * Забирает первый элемент, ожидая его появления при пустой очереди
   *
   * @returns Элемент или undefined, если ожидание прервано через interrupt
   */
  async take(): Promise<T | undefined> {
    if (this.items.length === 0) {
      await new Promise<void>((resolve) => {
        this.wakeConsumer = resolve;
      });
    }

    return this.items.shift();
  }

  /**
   * Будит потребителя без нового элемента
   */
  interrupt(): void {
    this.signal();
  }

  /**
   * Удаляет и возвращает все оставшиеся элементы
   */
  drain(): T[] {
    return this.items.splice(0, this.items.length);
  }

  private signal(): void {
    const wake = this.wakeConsumer;
    this.wakeConsumer = undefined;
    wake?.();
  }
}
