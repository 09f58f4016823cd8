import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { setTimeout as delay } from 'node:timers/promises';
import { ExecutorConfig } from '../../config/config';
import { CountingExecutor } from './counting-executor';
import { SubmitTaskDto } from './dto/submit-task.dto';
import { DiagnosticResult, TaskResponseDto } from './dto/task-response.dto';
import {
  ExecutorDisposedError,
  TaskCancelledError,
} from './errors/executor.errors';
import { SerialExecutorService } from './serial-executor.service';
import {
  CompletionState,
  ExecutorStats,
  WorkerState,
  WorkItemKind,
} from './types/executor.types';

export interface ExecutorStatsResponse extends ExecutorStats {
  /** Количество задач, принятых через декоратор */
  submissions: number;
}

/**
 * Контроллер для диагностики исполнителя через HTTP API
 *
 * @description
 * Предоставляет REST API для:
 * - Отправки пробных задач на рабочий цикл
 * - Получения статистики
 * - Остановки исполнителя
 */
@Controller('executor')
export class ExecutorController {
  private readonly logger = new Logger(ExecutorController.name);

  private readonly defaultTimeoutMs: number;

  constructor(
    private readonly executor: CountingExecutor,
    private readonly serialExecutor: SerialExecutorService,
    configService: ConfigService,
  ) {
    this.defaultTimeoutMs =
      configService.getOrThrow<ExecutorConfig>('executor').defaultTimeoutMs;
  }

  /**
   * Выполняет пробную задачу и возвращает ее итог
   *
   * @example
   * POST /executor/tasks
   * {
   *   "label": "warmup-1",
   *   "mode": "ASYNC",
   *   "durationMs": 250,
   *   "timeoutMs": 1000
   * }
   */
  @Post('tasks')
  @HttpCode(HttpStatus.OK)
  async submitTask(@Body() dto: SubmitTaskDto): Promise<TaskResponseDto> {
    this.logger.log(
      `Submit task request: label="${dto.label}", mode=${dto.mode}`,
    );

    const timeoutMs = dto.timeoutMs ?? this.defaultTimeoutMs;

    let pending: Promise<DiagnosticResult>;
    try {
      pending =
        dto.mode === WorkItemKind.VALUE
          ? this.executor.execute(() => this.runDiagnostic(dto), timeoutMs)
          : this.executor.executeAsync(async () => {
              await delay(dto.durationMs ?? 0);
              return this.runDiagnostic(dto);
            }, timeoutMs);
    } catch (error) {
      if (error instanceof ExecutorDisposedError) {
        return new TaskResponseDto(
          dto.label,
          CompletionState.CANCELLED,
          undefined,
          error.message,
        );
      }

      throw error;
    }

    try {
      const result = await pending;
      return new TaskResponseDto(dto.label, CompletionState.RESOLVED, result);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);

      return new TaskResponseDto(
        dto.label,
        error instanceof TaskCancelledError
          ? CompletionState.CANCELLED
          : CompletionState.FAILED,
        undefined,
        message,
      );
    }
  }

  /**
   * Возвращает статистику исполнителя
   *
   * @example
   * GET /executor/stats
   * Response:
   * {
   *   "submitted": 12,
   *   "completed": 9,
   *   "failed": 1,
   *   "cancelled": 2,
   *   "pending": 0,
   *   "running": 0,
   *   "submissions": 12
   * }
   */
  @Get('stats')
  getStats(): ExecutorStatsResponse {
    return {
      ...this.serialExecutor.getStats(),
      submissions: this.executor.executionsCount,
    };
  }

  /**
   * Инициирует остановку исполнителя, не дожидаясь ее завершения
   */
  @Post('shutdown')
  @HttpCode(HttpStatus.OK)
  shutdown(): { message: string; status: string } {
    this.logger.log('Shutdown requested via API');

    void this.executor.dispose().then((exited) => {
      this.logger.log(`Shutdown completed via API: exited=${exited}`);
    });

    return {
      message: 'Shutdown initiated',
      status: 'shutting_down',
    };
  }

  /**
   * Проверяет состояние исполнителя
   *
   * @example
   * GET /executor/health
   * Response:
   * {
   *   "status": "healthy",
   *   "state": "IDLE",
   *   "isDisposed": false,
   *   "runningTasks": 0,
   *   "pendingTasks": 0
   * }
   */
  @Get('health')
  getHealth(): {
    status: string;
    state: WorkerState;
    isDisposed: boolean;
    runningTasks: number;
    pendingTasks: number;
  } {
    const stats = this.serialExecutor.getStats();
    const isDisposed = this.serialExecutor.isDisposed();

    return {
      status: isDisposed ? 'shutting_down' : 'healthy',
      state: this.serialExecutor.getState(),
      isDisposed,
      runningTasks: stats.running,
      pendingTasks: stats.pending,
    };
  }

  private runDiagnostic(dto: SubmitTaskDto): DiagnosticResult {
    if (dto.fail) {
      throw new Error(`Diagnostic task "${dto.label}" failed`);
    }

    return {
      label: dto.label,
      mode: dto.mode,
      executedAt: new Date().toISOString(),
    };
  }
}
