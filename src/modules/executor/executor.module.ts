import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ExecutorConfig } from '../../config/config';
import { CountingExecutor } from './counting-executor';
import { ExecutorController } from './executor.controller';
import { SerialExecutorService } from './serial-executor.service';

/**
 * Модуль исполнителя задач на одном рабочем цикле
 *
 * @description
 * Предоставляет:
 * - SerialExecutorService: строгий FIFO, одна задача за раз, таймауты
 * - CountingExecutor: тот же исполнитель со счетчиком принятых задач
 * - HTTP API для диагностики
 *
 * @example
 * ```typescript
 * constructor(private readonly executor: CountingExecutor) {}
 *
 * async readBalance() {
 *   return this.executor.execute(() => this.ledger.balance(), 1000);
 * }
 * ```
 */
@Module({
  controllers: [ExecutorController],
  providers: [
    {
      provide: SerialExecutorService,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const { disposeTimeoutMs } =
          configService.getOrThrow<ExecutorConfig>('executor');
        return new SerialExecutorService({ disposeTimeoutMs });
      },
    },
    {
      provide: CountingExecutor,
      inject: [SerialExecutorService],
      useFactory: (executor: SerialExecutorService) =>
        new CountingExecutor(executor),
    },
  ],
  exports: [SerialExecutorService, CountingExecutor],
})
export class ExecutorModule {}
