import { Inject, Injectable, Logger } from '@nestjs/common';
import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { PIPELINE_SETTINGS, PipelineSettings, requireSetting } from '../config/pipeline-settings';

@Injectable()
export class SupabaseService {
  private readonly logger = new Logger(SupabaseService.name);
  private _supabaseService?: SupabaseClient;

  constructor(@Inject(PIPELINE_SETTINGS) private readonly settings: PipelineSettings) {}

  /**
   * Service-role client, created on first use so that commands which never touch
   * the database (or only preview) do not require credentials at boot.
   */
  getServiceClient(): SupabaseClient {
    if (!this._supabaseService) {
      const url = requireSetting(this.settings, 'SUPABASE_URL');
      const serviceKey = requireSetting(this.settings, 'SUPABASE_SERVICE_ROLE_KEY');
      this._supabaseService = createClient(url, serviceKey, {
        auth: { persistSession: false, autoRefreshToken: false },
      });
      this.logger.log('Supabase service client (service_role key) initialized successfully.');
    }
    return this._supabaseService;
  }
}
