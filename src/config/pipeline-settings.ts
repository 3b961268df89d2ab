import { ConfigService } from '@nestjs/config';
import { ConfigurationError, errorMessage } from '../common/errors';
import { isRecord } from '../common/json-response';

export const PIPELINE_SETTINGS = Symbol('PIPELINE_SETTINGS');

export interface PipelineSettings {
  supabase: {
    url?: string;
    serviceRoleKey?: string;
    imagesBucket: string;
  };
  encryptionSecret?: string;
  groq: {
    apiKey?: string;
    titleModel: string;
    descriptionModel: string;
    specsModel: string;
    gtinModel: string;
  };
  images: {
    serpApiKey?: string;
    removeBgApiKey?: string;
    searchCount: number;
  };
  firecrawl: {
    apiKey?: string;
    detailUrlTemplate?: string;
  };
  marketplace: {
    baseUrl: string;
    clientId?: string;
    clientSecret?: string;
    siteId: string;
    accountId?: string;
    refreshMarginSeconds: number;
  };
  pricing: PricingSettings;
  telegram: {
    botToken?: string;
    chatId?: string;
  };
  httpTimeoutMs: number;
  batch: {
    defaultLimit: number;
    gtinLimit: number;
    delaySeconds: number;
  };
  schedulerEnabled: boolean;
}

export interface CommissionTier {
  /** Inclusive upper bound of the base cost; null for the last, open-ended tier. */
  max: number | null;
  rate: number;
}

export interface PricingSettings {
  operationalCost: number;
  targetMargin: number;
  shippingFee: number;
  /** Used when no commission tiers are configured. */
  commissionRate: number;
  commissionTiers: CommissionTier[];
  taxRate: number;
}

/** Environment names a stage may declare as required before its batch starts. */
export type SettingKey =
  | 'SUPABASE_URL'
  | 'SUPABASE_SERVICE_ROLE_KEY'
  | 'CREDENTIALS_ENCRYPTION_SECRET'
  | 'GROQ_API_KEY'
  | 'SERPAPI_KEY'
  | 'FIRECRAWL_API_KEY'
  | 'SUPPLIER_DETAIL_URL_TEMPLATE'
  | 'MARKETPLACE_CLIENT_ID'
  | 'MARKETPLACE_CLIENT_SECRET'
  | 'MARKETPLACE_ACCOUNT_ID';

const SETTING_READERS: Record<SettingKey, (settings: PipelineSettings) => string | undefined> = {
  SUPABASE_URL: (s) => s.supabase.url,
  SUPABASE_SERVICE_ROLE_KEY: (s) => s.supabase.serviceRoleKey,
  CREDENTIALS_ENCRYPTION_SECRET: (s) => s.encryptionSecret,
  GROQ_API_KEY: (s) => s.groq.apiKey,
  SERPAPI_KEY: (s) => s.images.serpApiKey,
  FIRECRAWL_API_KEY: (s) => s.firecrawl.apiKey,
  SUPPLIER_DETAIL_URL_TEMPLATE: (s) => s.firecrawl.detailUrlTemplate,
  MARKETPLACE_CLIENT_ID: (s) => s.marketplace.clientId,
  MARKETPLACE_CLIENT_SECRET: (s) => s.marketplace.clientSecret,
  MARKETPLACE_ACCOUNT_ID: (s) => s.marketplace.accountId,
};

/** Parses MARKETPLACE_COMMISSION_TIERS, e.g. `[{"max":100,"rate":0.18},{"max":null,"rate":0.1}]`. */
export function parseCommissionTiers(raw: string | undefined): CommissionTier[] {
  if (!raw) return [];
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`MARKETPLACE_COMMISSION_TIERS is not valid JSON: ${errorMessage(error)}`);
  }
  if (!Array.isArray(parsed)) {
    throw new ConfigurationError('MARKETPLACE_COMMISSION_TIERS must be a JSON array');
  }
  return parsed.map((tier: unknown, index) => {
    if (!isRecord(tier) || typeof tier.rate !== 'number' || tier.rate < 0 || tier.rate >= 1) {
      throw new ConfigurationError(`MARKETPLACE_COMMISSION_TIERS[${index}] needs a rate between 0 and 1`);
    }
    const max = tier.max ?? null;
    if (max === null || typeof max === 'number') {
      return { max, rate: tier.rate };
    }
    throw new ConfigurationError(`MARKETPLACE_COMMISSION_TIERS[${index}].max must be a number or null`);
  });
}

export const DEFAULT_GROQ_MODEL = 'llama-3.3-70b-versatile';

export function buildPipelineSettings(config: ConfigService): PipelineSettings {
  // Empty values in .env count as unset.
  const text = (key: string): string | undefined => {
    const value = config.get<string>(key);
    return value && value.trim() ? value.trim() : undefined;
  };
  const num = (key: string, fallback: number): number => {
    const value = config.get<number>(key);
    return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
  };

  return {
    supabase: {
      url: text('SUPABASE_URL'),
      serviceRoleKey: text('SUPABASE_SERVICE_ROLE_KEY'),
      imagesBucket: text('PRODUCT_IMAGES_BUCKET') ?? 'product-images',
    },
    encryptionSecret: text('CREDENTIALS_ENCRYPTION_SECRET'),
    groq: {
      apiKey: text('GROQ_API_KEY'),
      titleModel: text('GROQ_TITLE_MODEL') ?? DEFAULT_GROQ_MODEL,
      descriptionModel: text('GROQ_DESCRIPTION_MODEL') ?? DEFAULT_GROQ_MODEL,
      specsModel: text('GROQ_SPECS_MODEL') ?? DEFAULT_GROQ_MODEL,
      gtinModel: text('GROQ_GTIN_MODEL') ?? 'compound-beta',
    },
    images: {
      serpApiKey: text('SERPAPI_KEY'),
      removeBgApiKey: text('REMOVE_BG_API_KEY'),
      searchCount: num('IMAGE_SEARCH_COUNT', 5),
    },
    firecrawl: {
      apiKey: text('FIRECRAWL_API_KEY'),
      detailUrlTemplate: text('SUPPLIER_DETAIL_URL_TEMPLATE'),
    },
    marketplace: {
      baseUrl: text('MARKETPLACE_BASE_URL') ?? 'https://api.mercadolibre.com',
      clientId: text('MARKETPLACE_CLIENT_ID'),
      clientSecret: text('MARKETPLACE_CLIENT_SECRET'),
      siteId: text('MARKETPLACE_SITE_ID') ?? 'MEC',
      accountId: text('MARKETPLACE_ACCOUNT_ID'),
      refreshMarginSeconds: num('TOKEN_REFRESH_MARGIN_SECONDS', 300),
    },
    pricing: {
      operationalCost: num('MARKETPLACE_OPERATIONAL_COST', 0),
      targetMargin: num('MARKETPLACE_TARGET_MARGIN', 0.2),
      shippingFee: num('MARKETPLACE_SHIPPING_FEE', 0),
      commissionRate: num('MARKETPLACE_COMMISSION_RATE', 0.15),
      commissionTiers: parseCommissionTiers(text('MARKETPLACE_COMMISSION_TIERS')),
      taxRate: num('MARKETPLACE_TAX_RATE', 0.15),
    },
    telegram: {
      botToken: text('TELEGRAM_BOT_TOKEN'),
      chatId: text('TELEGRAM_CHAT_ID'),
    },
    httpTimeoutMs: num('HTTP_TIMEOUT_MS', 30_000),
    batch: {
      defaultLimit: num('DEFAULT_BATCH_LIMIT', 50),
      gtinLimit: num('GTIN_BATCH_LIMIT', 15),
      delaySeconds: num('DEFAULT_ITEM_DELAY_SECONDS', 0.5),
    },
    schedulerEnabled: (text('SCHEDULER_ENABLED') ?? 'true').toLowerCase() !== 'false',
  };
}

/**
 * Throws a ConfigurationError naming every missing setting.
 */
export function assertConfigured(settings: PipelineSettings, required: readonly SettingKey[], scope: string): void {
  const missing = required.filter((key) => !SETTING_READERS[key](settings));
  if (missing.length > 0) {
    throw new ConfigurationError(`${scope} requires ${missing.join(', ')}`, { missing });
  }
}

/** Reads a required setting, failing with a ConfigurationError when absent. */
export function requireSetting(settings: PipelineSettings, key: SettingKey): string {
  const value = SETTING_READERS[key](settings);
  if (!value) {
    throw new ConfigurationError(`${key} is not configured`, { missing: [key] });
  }
  return value;
}
