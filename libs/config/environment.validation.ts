import { plainToInstance } from 'class-transformer';
import {
  IsBooleanString,
  IsEnum,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';
import { NestingPolicy } from '@metrics/value-objects';

export class EnvironmentVariables {
  @IsOptional()
  @IsEnum(NestingPolicy)
  METRICS_NESTING_POLICY?: NestingPolicy;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  METRICS_LOGGER_NAME?: string;

  @IsOptional()
  @IsBooleanString()
  METRICS_TRACE_SCOPES?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  METRICS_LOG_FILE?: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(65535)
  PORT?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  INVENTORY_LOW_STOCK_THRESHOLD?: number;
}

/**
 * `validate` hook for ConfigModule.forRoot(). Throws on the first bad
 * environment so the app refuses to start.
 */
export function validateEnvironment(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .flatMap((error) => Object.values(error.constraints ?? {}))
      .join('; ');
    throw new Error(`Invalid environment: ${details}`);
  }
  return validated;
}
