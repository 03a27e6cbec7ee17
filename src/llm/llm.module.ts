import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import OpenAI from 'openai';
import { OPENAI_CLIENT } from './llm.constants';
import { LlmService } from './llm.service';

@Module({
  providers: [
    {
      provide: OPENAI_CLIENT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const apiKey = configService.get<string>('OPENAI_API_KEY');
        if (!apiKey) {
          throw new Error('OPENAI_API_KEY is required');
        }
        return new OpenAI({ apiKey, maxRetries: 0 });
      },
    },
    LlmService,
  ],
  exports: [LlmService],
})
export class LlmModule {}
