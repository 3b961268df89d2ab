import { Inject, Injectable, Logger } from '@nestjs/common';
import { ClassConstructor } from 'class-transformer';
import { PIPELINE_SETTINGS, PipelineSettings } from '../config/pipeline-settings';
import { toRecoverableError } from '../common/errors';
import { parseJsonResponse, sanitizeJsonLikeResponse } from '../common/json-response';
import { CHAT_COMPLETION, ChatCompletion, ChatRequest } from './groq-chat';
import { DescriptionResponseDto, GtinResponseDto, SpecsResponseDto, TitleResponseDto } from './generation.dto';
import { GeneratedSpecs, GenerationService, ProductContext } from './generation.types';

const TITLE_PROMPT = `Eres un experto en titulos para publicaciones de un marketplace.
Genera un titulo con la estructura: Producto + Marca + Modelo + Especificaciones clave.
No incluyas el estado del producto (nuevo, usado, reacondicionado), stock, garantia, envios, promociones ni descuentos.
Separa las palabras con espacios, sin guiones ni simbolos. Maximo 60 caracteres.
Responde solo con JSON: {"title": "..."}`;

const DESCRIPTION_PROMPT = `Eres un redactor de fichas de producto para un marketplace.
Escribe una descripcion en texto plano, organizada en parrafos cortos y una lista de caracteristicas con guiones.
No uses HTML, emojis, datos de contacto ni enlaces. No menciones precios, stock ni garantia.
Responde solo con JSON: {"description": "..."}`;

const SPECS_PROMPT = `Extrae especificaciones tecnicas estructuradas del producto.
Devuelve JSON con: "normalizedName" (nombre comercial limpio), "modelName" (modelo del fabricante o null)
y "specs" (objeto plano clave-valor en texto; incluye "brand" si se conoce la marca).
No inventes valores que no aparezcan en los datos.`;

const GTIN_PROMPT = `Busca en la web el codigo de barras GTIN/EAN/UPC del producto indicado.
Responde solo con JSON: {"gtin": "<solo digitos>"} o {"gtin": null} si no lo encuentras con certeza.`;

@Injectable()
export class AiGenerationService extends GenerationService {
  private readonly logger = new Logger(AiGenerationService.name);

  constructor(
    @Inject(CHAT_COMPLETION) private readonly chat: ChatCompletion,
    @Inject(PIPELINE_SETTINGS) private readonly settings: PipelineSettings,
  ) {
    super();
  }

  async generateTitle(context: ProductContext): Promise<string> {
    const response = await this.complete(
      {
        model: this.settings.groq.titleModel,
        messages: [
          { role: 'system', content: TITLE_PROMPT },
          { role: 'user', content: this.describeProduct(context) },
        ],
        temperature: 0.3,
        maxTokens: 200,
        json: true,
      },
      TitleResponseDto,
      `title for ${context.code}`,
    );
    return response.title.trim();
  }

  async generateDescription(context: ProductContext): Promise<string> {
    const response = await this.complete(
      {
        model: this.settings.groq.descriptionModel,
        messages: [
          { role: 'system', content: DESCRIPTION_PROMPT },
          { role: 'user', content: this.describeProduct(context) },
        ],
        temperature: 0.5,
        maxTokens: 1500,
        json: true,
      },
      DescriptionResponseDto,
      `description for ${context.code}`,
    );
    return response.description.trim();
  }

  async generateSpecs(context: ProductContext): Promise<GeneratedSpecs> {
    const response = await this.complete(
      {
        model: this.settings.groq.specsModel,
        messages: [
          { role: 'system', content: SPECS_PROMPT },
          { role: 'user', content: this.describeProduct(context) },
        ],
        temperature: 0.1,
        maxTokens: 1000,
        json: true,
      },
      SpecsResponseDto,
      `specs for ${context.code}`,
    );

    return {
      normalizedName: response.normalizedName?.trim() || null,
      modelName: response.modelName?.trim() || null,
      specs: flattenSpecs(response.specs),
    };
  }

  async searchGtin(query: string): Promise<string | null> {
    // Search models do not support JSON mode; the response is sanitized before parsing.
    const response = await this.complete(
      {
        model: this.settings.groq.gtinModel,
        messages: [
          { role: 'system', content: GTIN_PROMPT },
          { role: 'user', content: query },
        ],
        temperature: 0,
        maxTokens: 300,
      },
      GtinResponseDto,
      `GTIN search "${query}"`,
    );
    const gtin = response.gtin?.trim();
    return gtin ? gtin : null;
  }

  private async complete<T extends object>(request: ChatRequest, dto: ClassConstructor<T>, context: string): Promise<T> {
    let text: string | null;
    try {
      text = await this.chat(request);
    } catch (error) {
      throw toRecoverableError(error, `Groq ${context}`) ?? error;
    }
    this.logger.debug(`Groq ${context} responded: ${sanitizeJsonLikeResponse(text ?? '').slice(0, 200)}`);
    return parseJsonResponse(text, dto, `Groq ${context}`);
  }

  private describeProduct(context: ProductContext): string {
    return JSON.stringify(
      {
        code: context.code,
        description: context.description,
        category: context.category,
        name: context.name ?? undefined,
        specs: context.specs ?? undefined,
        attributes: context.attributes ?? undefined,
      },
      null,
      2,
    );
  }
}

/** Keeps scalar values as trimmed strings and drops empty ones. */
export function flattenSpecs(raw: Record<string, unknown>): Record<string, string> {
  const specs: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value === null || value === undefined) continue;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      const text = String(value).trim();
      if (text) specs[key.trim()] = text;
    } else if (Array.isArray(value)) {
      const text = value.filter((v) => typeof v === 'string' || typeof v === 'number').join(', ');
      if (text) specs[key.trim()] = text;
    }
  }
  return specs;
}
