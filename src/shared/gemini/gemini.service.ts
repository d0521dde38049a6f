import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GoogleGenAI } from '@google/genai';
import {
  CompletionOptions,
  ReasoningClient,
} from './reasoning-client.interface';
import { errorMessage } from '@/shared/lib/util';

@Injectable()
export class GeminiService implements ReasoningClient, OnModuleInit {
  private readonly logger = new Logger(GeminiService.name);
  private client: GoogleGenAI | null = null;
  readonly model: string;

  constructor(private readonly configService: ConfigService) {
    this.model =
      this.configService.get<string>('GEMINI_MODEL') || 'gemini-2.0-flash';
  }

  onModuleInit() {
    const apiKey = this.configService.get<string>('GEMINI_API_KEY');
    if (!apiKey) {
      this.logger.warn(
        'GEMINI_API_KEY is not configured; extraction jobs will fail at the extract stage',
      );
      return;
    }
    this.client = new GoogleGenAI({ apiKey });
    this.logger.log(`Gemini client initialized with ${this.model}`);
  }

  /**
   * Generate text content for a prompt.
   * @param options.json - force a JSON response body
   */
  async complete(
    prompt: string,
    options: CompletionOptions = {},
  ): Promise<string> {
    if (!this.client) {
      throw new Error(
        'Gemini client is not initialized. Check GEMINI_API_KEY configuration.',
      );
    }

    try {
      const result = await this.client.models.generateContent({
        model: this.model,
        contents: prompt,
        config: {
          responseMimeType: options.json ? 'application/json' : undefined,
          abortSignal: options.signal,
        },
      });

      const text = result.candidates?.[0]?.content?.parts?.[0]?.text;

      if (!text) {
        throw new Error('No text returned from Gemini API');
      }

      return text;
    } catch (error) {
      this.logger.error(`Failed to generate text: ${errorMessage(error)}`);
      throw error;
    }
  }
}
