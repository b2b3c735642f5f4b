import { Transform } from 'class-transformer';
import { IsArray, IsEnum, IsNotEmpty, IsOptional, IsString } from 'class-validator';
import { ContentType } from '../content.types';

export class ContentDto {
  @IsString()
  @IsNotEmpty()
  contentId!: string;

  @IsString()
  title!: string;

  @IsString()
  body!: string;

  @IsString()
  language!: string;

  @IsOptional()
  @IsString()
  difficultyLevel?: string;

  @IsEnum(ContentType)
  contentType!: ContentType;

  @IsOptional()
  @IsString()
  sourceUrl?: string;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  @Transform(({ value }: { value: unknown }) => (typeof value === 'string' ? [value] : value))
  tags?: string[];
}
