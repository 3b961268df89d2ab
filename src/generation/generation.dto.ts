import { Transform } from 'class-transformer';
import { IsNotEmpty, IsObject, IsOptional, IsString } from 'class-validator';

export class TitleResponseDto {
  @IsString()
  @IsNotEmpty()
  title!: string;
}

export class DescriptionResponseDto {
  @IsString()
  @IsNotEmpty()
  description!: string;
}

export class SpecsResponseDto {
  @IsOptional()
  @IsString()
  normalizedName?: string | null;

  @IsOptional()
  @IsString()
  modelName?: string | null;

  @IsObject()
  specs!: Record<string, unknown>;
}

export class GtinResponseDto {
  // Models sometimes answer with a bare number.
  @Transform(({ value }) => (typeof value === 'number' ? String(value) : value))
  @IsOptional()
  @IsString()
  gtin?: string | null;
}
