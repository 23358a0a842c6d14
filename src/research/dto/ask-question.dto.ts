import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import {
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  MaxLength,
  Min,
} from 'class-validator';

export class AskQuestionDto {
  @ApiProperty({
    description: '질문',
    example: 'How do leading companies shorten the month-end close?',
  })
  @IsString({ message: 'question must be a string' })
  @IsNotEmpty({ message: 'question cannot be empty' })
  @MaxLength(2000, { message: 'question must be at most 2000 characters' })
  @Transform(({ value }) => (typeof value === 'string' ? value.trim() : value))
  question!: string;

  @ApiPropertyOptional({
    description: '웹 검색 결과 수 (기본값: 설정값)',
    minimum: 1,
    maximum: 10,
  })
  @IsOptional()
  @IsInt({ message: 'maxResults must be an integer' })
  @Min(1, { message: 'maxResults must be at least 1' })
  @Max(10, { message: 'maxResults must be at most 10' })
  maxResults?: number;
}
