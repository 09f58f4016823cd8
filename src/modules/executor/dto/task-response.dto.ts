import { CompletionState } from '../types/executor.types';

export interface DiagnosticResult {
  label: string;
  mode: string;
  executedAt: string;
}

/**
 * DTO для ответа с результатом пробной задачи
 */
export class TaskResponseDto {
  /**
   * Метка задачи
   */
  label: string;

  /**
   * Итоговое состояние задачи
   */
  status: CompletionState;

  /**
   * Результат (если задача выполнена)
   */
  result?: DiagnosticResult;

  /**
   * Сообщение об ошибке или отмене
   */
  error?: string;

  constructor(
    label: string,
    status: CompletionState,
    result?: DiagnosticResult,
    error?: string,
  ) {
    this.label = label;
    this.status = status;
    this.result = result;
    this.error = error;
  }
}
