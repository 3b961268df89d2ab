import { Inject, Injectable, Logger } from '@nestjs/common';
import { AxiosInstance } from 'axios';
import sharp from 'sharp';
import { PIPELINE_SETTINGS, PipelineSettings } from '../config/pipeline-settings';
import { errorMessage, MalformedResponseError, toRecoverableError } from '../common/errors';
import { IMAGES_HTTP } from './image-search.service';

export const CANVAS_SIZE = 800;
const PADDING = 20;
const WHITE = { r: 255, g: 255, b: 255, alpha: 1 };

export abstract class ImageProcessor {
  /** Returns a JPEG centred on a white square canvas. */
  abstract process(image: Buffer, removeBackground: boolean): Promise<Buffer>;
}

@Injectable()
export class SharpImageProcessor extends ImageProcessor {
  private readonly logger = new Logger(SharpImageProcessor.name);

  constructor(
    @Inject(PIPELINE_SETTINGS) private readonly settings: PipelineSettings,
    @Inject(IMAGES_HTTP) private readonly http: AxiosInstance,
  ) {
    super();
  }

  async process(image: Buffer, removeBackground: boolean): Promise<Buffer> {
    const source = removeBackground ? await this.removeBackground(image) : image;
    try {
      return await sharp(source)
        .rotate()
        .resize(CANVAS_SIZE - 2 * PADDING, CANVAS_SIZE - 2 * PADDING, {
          fit: 'contain',
          background: WHITE,
          withoutEnlargement: false,
        })
        .flatten({ background: WHITE })
        .extend({ top: PADDING, bottom: PADDING, left: PADDING, right: PADDING, background: WHITE })
        .jpeg({ quality: 95, chromaSubsampling: '4:4:4' })
        .toBuffer();
    } catch (error) {
      throw new MalformedResponseError(`Image could not be processed: ${errorMessage(error)}`);
    }
  }

  /** Transparent PNG with the background cut out, via remove.bg. */
  private async removeBackground(image: Buffer): Promise<Buffer> {
    const apiKey = this.settings.images.removeBgApiKey;
    if (!apiKey) {
      this.logger.warn('REMOVE_BG_API_KEY not set. Primary image keeps its original background.');
      return image;
    }

    const form = new FormData();
    form.append('image_file', new Blob([image]), 'image');
    form.append('size', 'auto');
    try {
      const response = await this.http.post<ArrayBuffer>('https://api.remove.bg/v1.0/removebg', form, {
        headers: { 'X-Api-Key': apiKey },
        responseType: 'arraybuffer',
        timeout: this.settings.httpTimeoutMs,
      });
      return Buffer.from(response.data);
    } catch (error) {
      throw toRecoverableError(error, 'remove.bg background removal') ?? error;
    }
  }
}
