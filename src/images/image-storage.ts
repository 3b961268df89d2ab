import { Inject, Injectable, Logger } from '@nestjs/common';
import { SupabaseService } from '../common/supabase.service';
import { UpstreamServiceError } from '../common/errors';
import { PIPELINE_SETTINGS, PipelineSettings } from '../config/pipeline-settings';

export abstract class ImageStorage {
  /** Stores a processed JPEG and returns its public URL. */
  abstract upload(image: Buffer, path: string): Promise<string>;
}

@Injectable()
export class SupabaseImageStorage extends ImageStorage {
  private readonly logger = new Logger(SupabaseImageStorage.name);

  constructor(
    private readonly supabaseService: SupabaseService,
    @Inject(PIPELINE_SETTINGS) private readonly settings: PipelineSettings,
  ) {
    super();
  }

  async upload(image: Buffer, path: string): Promise<string> {
    const bucket = this.supabaseService.getServiceClient().storage.from(this.settings.supabase.imagesBucket);
    const { error } = await bucket.upload(path, image, { contentType: 'image/jpeg', upsert: true });
    if (error) {
      this.logger.error(`Upload of ${path} failed: ${error.message}`);
      throw new UpstreamServiceError(`Image upload failed: ${error.message}`, { path });
    }
    return bucket.getPublicUrl(path).data.publicUrl;
  }
}
