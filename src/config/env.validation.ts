import 'reflect-metadata';
import { plainToClass, Type } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';

export class EnvironmentVariables {
  @IsOptional()
  @IsIn(['development', 'production', 'test'])
  NODE_ENV?: 'development' | 'production' | 'test';

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT?: number;

  @IsOptional()
  @IsString()
  OPENAI_API_KEY?: string;

  @IsOptional()
  @IsString()
  OPENAI_MODEL?: string;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  @Max(2)
  OPENAI_TEMPERATURE?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  OPENAI_MAX_TOKENS?: number;

  @IsOptional()
  @IsString()
  TAVILY_API_KEY?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(20)
  TAVILY_MAX_RESULTS?: number;

  @IsOptional()
  @IsString()
  REPORT_LOGO_PATH?: string;

  @IsOptional()
  @IsString()
  REPORT_PRODUCT_NAME?: string;
}

/**
 * ConfigModule 환경 변수 검증
 */
export function validateEnvironment(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const validatedConfig = plainToClass(EnvironmentVariables, config);
  const errors = validateSync(validatedConfig, {
    skipMissingProperties: false,
  });

  if (errors.length > 0) {
    const messages = errors.flatMap((error) =>
      Object.values(error.constraints ?? {}),
    );
    throw new Error(`Invalid environment configuration: ${messages.join(', ')}`);
  }

  return validatedConfig;
}
