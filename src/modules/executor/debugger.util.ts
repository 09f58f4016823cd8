import * as inspector from 'node:inspector';

/**
 * Проверяет, открыт ли в процессе инспектор
 *
 * @description
 * inspector.url() возвращает адрес, как только инспектор открыт
 * (--inspect, --inspect-brk, inspector.open()), даже если клиент отладчика
 * еще не подключился. Поэтому запуск с --inspect без подключенного
 * отладчика тоже отключает таймауты задач
 */
export function isDebuggerAttached(): boolean {
  return inspector.url() !== undefined;
}
