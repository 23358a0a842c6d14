import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  ArrayMaxSize,
  ArrayMinSize,
  IsArray,
  IsBoolean,
  IsIn,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
} from 'class-validator';
import {
  REPORT_LAYOUT_NAMES,
  ReportLayoutName,
} from '../../report/report-layout';

export const MAX_PROBLEM_LENGTH = 20000;

export class DiagnoseProblemDto {
  @ApiProperty({
    description: '재무 전환 문제 설명 (빈 문자열 허용)',
    example: 'Intercompany balances never match at month end.',
    maxLength: MAX_PROBLEM_LENGTH,
  })
  @IsString({ message: 'problem must be a string' })
  @MaxLength(MAX_PROBLEM_LENGTH, {
    message: `problem must be at most ${MAX_PROBLEM_LENGTH} characters`,
  })
  problem!: string;

  @ApiPropertyOptional({
    description: 'AI 컨설팅 브리프 생성 여부 (기본값: false)',
    default: false,
  })
  @IsOptional()
  @IsBoolean({ message: 'includeAiBrief must be a boolean' })
  includeAiBrief?: boolean;
}

export class BatchDiagnoseDto {
  @ApiProperty({
    description: '분류할 문제 설명 목록 (1-100건)',
    type: [String],
  })
  @IsArray({ message: 'problems must be an array' })
  @ArrayMinSize(1, { message: 'problems must have at least one item' })
  @ArrayMaxSize(100, { message: 'problems must have at most 100 items' })
  @IsString({ each: true, message: 'each problem must be a string' })
  @MaxLength(MAX_PROBLEM_LENGTH, {
    each: true,
    message: `each problem must be at most ${MAX_PROBLEM_LENGTH} characters`,
  })
  problems!: string[];
}

export class GenerateReportDto {
  @ApiProperty({ description: '재무 전환 문제 설명' })
  @IsString({ message: 'problem must be a string' })
  @MaxLength(MAX_PROBLEM_LENGTH, {
    message: `problem must be at most ${MAX_PROBLEM_LENGTH} characters`,
  })
  problem!: string;

  @ApiProperty({ description: '회사명', example: 'Example Holdings' })
  @IsString({ message: 'companyName must be a string' })
  @IsNotEmpty({ message: 'companyName cannot be empty' })
  @MaxLength(200, { message: 'companyName must be at most 200 characters' })
  companyName!: string;

  @ApiProperty({ description: '산업', example: 'Manufacturing' })
  @IsString({ message: 'industry must be a string' })
  @IsNotEmpty({ message: 'industry cannot be empty' })
  @MaxLength(200, { message: 'industry must be at most 200 characters' })
  industry!: string;

  @ApiPropertyOptional({ description: '매출 규모', example: '1.2bn EUR' })
  @IsOptional()
  @IsString({ message: 'revenue must be a string' })
  @MaxLength(100, { message: 'revenue must be at most 100 characters' })
  revenue?: string;

  @ApiPropertyOptional({ description: '임직원 수', example: '4,500' })
  @IsOptional()
  @IsString({ message: 'employees must be a string' })
  @MaxLength(100, { message: 'employees must be at most 100 characters' })
  employees?: string;

  @ApiPropertyOptional({
    description: '이전에 생성한 AI 브리프 (마크다운)',
  })
  @IsOptional()
  @IsString({ message: 'aiBrief must be a string' })
  @MaxLength(MAX_PROBLEM_LENGTH, {
    message: `aiBrief must be at most ${MAX_PROBLEM_LENGTH} characters`,
  })
  aiBrief?: string;

  @ApiPropertyOptional({
    description: '리포트 레이아웃 (기본값: classic)',
    enum: [...REPORT_LAYOUT_NAMES],
  })
  @IsOptional()
  @IsIn([...REPORT_LAYOUT_NAMES], {
    message: `layout must be one of: ${REPORT_LAYOUT_NAMES.join(', ')}`,
  })
  layout?: ReportLayoutName;
}
