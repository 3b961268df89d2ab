/** Product data handed to the generation collaborator. */
export interface ProductContext {
  code: string;
  description: string;
  category: string | null;
  name?: string | null;
  specs?: Record<string, string> | null;
  attributes?: Record<string, string> | null;
}

export interface GeneratedSpecs {
  normalizedName: string | null;
  modelName: string | null;
  specs: Record<string, string>;
}

/**
 * Text generation used by the enrichment stages. Implementations raise RecoverableError
 * subclasses for timeouts, upstream failures and malformed output.
 */
export abstract class GenerationService {
  abstract generateTitle(context: ProductContext): Promise<string>;
  abstract generateDescription(context: ProductContext): Promise<string>;
  abstract generateSpecs(context: ProductContext): Promise<GeneratedSpecs>;
  /** Returns the raw candidate the model found, or null when it reports none. */
  abstract searchGtin(query: string): Promise<string | null>;
}
