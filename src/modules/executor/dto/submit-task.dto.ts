import {
  IsBoolean,
  IsEnum,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Min,
} from 'class-validator';
import { WorkItemKind } from '../types/executor.types';

/**
 * DTO для отправки пробной задачи в исполнитель через HTTP API
 */
export class SubmitTaskDto {
  /**
   * Метка задачи (используется в логах и ответе)
   * @example "warmup-1"
   */
  @IsString()
  @IsNotEmpty()
  label!: string;

  /**
   * Вид задачи: VALUE возвращает значение сразу, ASYNC ждет durationMs
   * @example "ASYNC"
   */
  @IsEnum(WorkItemKind)
  mode!: WorkItemKind;

  /**
   * Длительность асинхронной задачи в миллисекундах
   * @example 250
   */
  @IsOptional()
  @IsNumber()
  @Min(0)
  durationMs?: number;

  /**
   * Таймаут выполнения в миллисекундах (по умолчанию из конфигурации)
   * @example 1000
   */
  @IsOptional()
  @IsNumber()
  @Min(0)
  timeoutMs?: number;

  /**
   * Завершить задачу ошибкой
   */
  @IsOptional()
  @IsBoolean()
  fail?: boolean;
}
