import { Inject, Injectable } from '@nestjs/common';
import { AxiosInstance } from 'axios';
import { PIPELINE_SETTINGS, PipelineSettings } from '../config/pipeline-settings';
import { MalformedResponseError, toRecoverableError } from '../common/errors';
import { IMAGES_HTTP } from './image-search.service';

const MAX_IMAGE_BYTES = 15 * 1024 * 1024;

export abstract class ImageDownloader {
  abstract download(url: string): Promise<Buffer>;
}

@Injectable()
export class HttpImageDownloader extends ImageDownloader {
  constructor(
    @Inject(PIPELINE_SETTINGS) private readonly settings: PipelineSettings,
    @Inject(IMAGES_HTTP) private readonly http: AxiosInstance,
  ) {
    super();
  }

  async download(url: string): Promise<Buffer> {
    let data: ArrayBuffer;
    let contentType: string;
    try {
      const response = await this.http.get<ArrayBuffer>(url, {
        responseType: 'arraybuffer',
        timeout: this.settings.httpTimeoutMs,
        maxContentLength: MAX_IMAGE_BYTES,
        headers: { Accept: 'image/*' },
      });
      data = response.data;
      contentType = String(response.headers['content-type'] ?? '');
    } catch (error) {
      throw toRecoverableError(error, `Image download ${url}`) ?? error;
    }

    if (contentType && !contentType.startsWith('image/')) {
      throw new MalformedResponseError(`Image download ${url} returned ${contentType}`);
    }
    const bytes = Buffer.from(data);
    if (bytes.length === 0) {
      throw new MalformedResponseError(`Image download ${url} returned an empty body`);
    }
    return bytes;
  }
}
