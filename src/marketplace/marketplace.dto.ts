import { Transform } from 'class-transformer';
import { IsInt, IsNotEmpty, IsOptional, IsPositive, IsString } from 'class-validator';

// The marketplace returns numeric user ids.
const toIdString = ({ value }: { value: unknown }) => (typeof value === 'number' ? String(value) : value);

export class TokenResponseDto {
  @IsString()
  @IsNotEmpty()
  access_token!: string;

  @IsString()
  @IsNotEmpty()
  refresh_token!: string;

  @IsInt()
  @IsPositive()
  expires_in!: number;

  @Transform(toIdString)
  @IsString()
  user_id!: string;
}

export class MarketplaceUserDto {
  @Transform(toIdString)
  @IsString()
  id!: string;

  @IsString()
  nickname!: string;

  @IsOptional()
  @IsString()
  site_id?: string | null;
}

export class CreatedItemDto {
  @IsString()
  @IsNotEmpty()
  id!: string;

  @IsOptional()
  @IsString()
  permalink?: string | null;
}
