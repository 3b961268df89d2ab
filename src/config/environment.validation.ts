import { plainToInstance } from 'class-transformer';
import {
  IsBooleanString,
  IsInt,
  IsJSON,
  IsNumber,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  validateSync,
} from 'class-validator';
import { ConfigurationError } from '../common/errors';

export class EnvironmentVariables {
  @IsOptional()
  @IsUrl({ require_tld: false })
  SUPABASE_URL?: string;

  @IsOptional()
  @IsString()
  SUPABASE_SERVICE_ROLE_KEY?: string;

  @IsOptional()
  @IsString()
  PRODUCT_IMAGES_BUCKET?: string;

  @IsOptional()
  @IsString()
  CREDENTIALS_ENCRYPTION_SECRET?: string;

  @IsOptional()
  @IsString()
  GROQ_API_KEY?: string;

  @IsOptional()
  @IsString()
  GROQ_TITLE_MODEL?: string;

  @IsOptional()
  @IsString()
  GROQ_DESCRIPTION_MODEL?: string;

  @IsOptional()
  @IsString()
  GROQ_SPECS_MODEL?: string;

  @IsOptional()
  @IsString()
  GROQ_GTIN_MODEL?: string;

  @IsOptional()
  @IsString()
  SERPAPI_KEY?: string;

  @IsOptional()
  @IsString()
  REMOVE_BG_API_KEY?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  IMAGE_SEARCH_COUNT?: number;

  @IsOptional()
  @IsString()
  FIRECRAWL_API_KEY?: string;

  @IsOptional()
  @IsString()
  SUPPLIER_DETAIL_URL_TEMPLATE?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  MARKETPLACE_BASE_URL?: string;

  @IsOptional()
  @IsString()
  MARKETPLACE_CLIENT_ID?: string;

  @IsOptional()
  @IsString()
  MARKETPLACE_CLIENT_SECRET?: string;

  @IsOptional()
  @IsString()
  MARKETPLACE_SITE_ID?: string;

  @IsOptional()
  @IsString()
  MARKETPLACE_ACCOUNT_ID?: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  TOKEN_REFRESH_MARGIN_SECONDS?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  MARKETPLACE_OPERATIONAL_COST?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  MARKETPLACE_TARGET_MARGIN?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  MARKETPLACE_SHIPPING_FEE?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(0.95)
  MARKETPLACE_COMMISSION_RATE?: number;

  @IsOptional()
  @IsJSON()
  MARKETPLACE_COMMISSION_TIERS?: string;

  @IsOptional()
  @IsNumber()
  @Min(0)
  MARKETPLACE_TAX_RATE?: number;

  @IsOptional()
  @IsString()
  TELEGRAM_BOT_TOKEN?: string;

  @IsOptional()
  @IsString()
  TELEGRAM_CHAT_ID?: string;

  @IsOptional()
  @IsInt()
  @Min(1000)
  HTTP_TIMEOUT_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  DEFAULT_BATCH_LIMIT?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  GTIN_BATCH_LIMIT?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  DEFAULT_ITEM_DELAY_SECONDS?: number;

  @IsOptional()
  @IsBooleanString()
  SCHEDULER_ENABLED?: string;
}

/**
 * Passed to ConfigModule.forRoot. Numeric settings are converted implicitly;
 * anything malformed aborts startup. Empty values count as unset.
 */
export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const present = Object.fromEntries(Object.entries(config).filter(([, value]) => value !== ''));
  const validatedConfig = plainToInstance(EnvironmentVariables, present, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validatedConfig, { skipMissingProperties: false });

  if (errors.length > 0) {
    const problems = errors.map((e) => `${e.property}: ${Object.values(e.constraints ?? {}).join(', ')}`);
    throw new ConfigurationError(`Invalid environment configuration: ${problems.join('; ')}`, { problems });
  }
  return validatedConfig;
}
