import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SupabaseService } from './supabase.service';
import { EncryptionService } from './encryption.service';
import { buildPipelineSettings, PIPELINE_SETTINGS } from '../config/pipeline-settings';

@Global()
@Module({
  providers: [
    {
      provide: PIPELINE_SETTINGS,
      useFactory: (configService: ConfigService) => buildPipelineSettings(configService),
      inject: [ConfigService],
    },
    SupabaseService,
    EncryptionService,
  ],
  exports: [PIPELINE_SETTINGS, SupabaseService, EncryptionService],
})
export class CommonModule {}
