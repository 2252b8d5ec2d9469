import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  IsBoolean,
  IsEnum,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
} from 'class-validator';
import { Intent, SOURCE_CATEGORIES, SourceCategory, ValidatorState } from '../rag/rag.types';

export class ChatRequestDto {
  @ApiProperty({ example: 'What degree did you study?' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(2000)
  query!: string;

  @ApiPropertyOptional({ description: 'Record progress events and return them in metadata' })
  @IsBoolean()
  @IsOptional()
  stream?: boolean;

  @ApiPropertyOptional({ enum: Intent, description: 'Skip classification and route to this intent' })
  @IsEnum(Intent)
  @IsOptional()
  forceIntent?: Intent;
}

export class ChatStreamQueryDto {
  @ApiProperty({ example: 'Walk me through your projects' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(2000)
  query!: string;

  @ApiPropertyOptional({ enum: Intent })
  @IsEnum(Intent)
  @IsOptional()
  intent?: Intent;
}

export class SourceDto {
  @ApiProperty()
  id!: string;

  @ApiProperty({ enum: SOURCE_CATEGORIES })
  sourceCategory!: SourceCategory;

  @ApiPropertyOptional()
  title?: string;

  @ApiProperty()
  score!: number;

  @ApiProperty({ example: '[1]' })
  citation!: string;

  @ApiProperty()
  excerpt!: string;
}

export class ChatResponseDto {
  @ApiProperty()
  response!: string;

  @ApiProperty({ type: [SourceDto] })
  sources!: SourceDto[];

  @ApiProperty({ enum: Intent })
  intent!: Intent;

  @ApiProperty({ minimum: 0, maximum: 1 })
  confidence!: number;

  @ApiProperty({
    description: 'Validator outcome, retries, degradations, tool calls and stage latencies',
    example: { validation: { state: ValidatorState.PASSED }, retryCount: 0, degraded: false },
  })
  metadata!: Record<string, unknown>;
}
