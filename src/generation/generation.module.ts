import { Module } from '@nestjs/common';
import { PIPELINE_SETTINGS, PipelineSettings } from '../config/pipeline-settings';
import { AiGenerationService } from './ai-generation.service';
import { GenerationService } from './generation.types';
import { CHAT_COMPLETION, createGroqChatCompletion } from './groq-chat';

@Module({
  providers: [
    {
      provide: CHAT_COMPLETION,
      useFactory: (settings: PipelineSettings) => createGroqChatCompletion(settings),
      inject: [PIPELINE_SETTINGS],
    },
    { provide: GenerationService, useClass: AiGenerationService },
  ],
  exports: [GenerationService],
})
export class GenerationModule {}
