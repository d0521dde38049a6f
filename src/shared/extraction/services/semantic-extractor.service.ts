import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  REASONING_CLIENT,
  ReasoningClient,
} from '@/shared/gemini/reasoning-client.interface';
import type { NormalizedDocument } from '@/shared/scraping/interfaces/document.interface';
import type {
  EntityBreakdown,
  ExtractionMetadata,
  ExtractionPayload,
  ExtractionResult,
  JsonValue,
  SemanticExtractionOptions,
} from '../interfaces/extraction-result.interface';
import {
  classifyPayload,
  isJsonObject,
  parseModelJson,
} from '../utils/model-response';
import {
  detectEntities,
  entitiesFromModel,
  mergeEntities,
} from '../utils/entity-detector';
import { ExtractionFailedError } from '@/shared/common/errors/pipeline.errors';
import { errorMessage, withTimeout } from '@/shared/lib/util';

export const MAX_PROMPT_CONTENT_CHARS = 6000;

const PARSED_CONFIDENCE = 0.8;
const UNSTRUCTURED_CONFIDENCE = 0.2;

/**
 * Turns a document and a free-form instruction into an instruction-shaped
 * result through the reasoning service. An unparseable answer degrades to
 * the `unstructured` variant; a failed or timed-out call aborts the job.
 */
@Injectable()
export class SemanticExtractorService {
  private readonly logger = new Logger(SemanticExtractorService.name);
  private readonly timeoutMs: number;

  constructor(
    @Inject(REASONING_CLIENT) private readonly client: ReasoningClient,
    configService: ConfigService,
  ) {
    this.timeoutMs = configService.get<number>('GEMINI_TIMEOUT_MS') || 60_000;
  }

  async extract(
    document: NormalizedDocument,
    instruction: string,
    options: SemanticExtractionOptions,
  ): Promise<ExtractionResult> {
    const startTime = Date.now();
    const contentTruncated = document.text.length > MAX_PROMPT_CONTENT_CHARS;
    const prompt = this.buildPrompt(document, instruction, options);

    let response: string;
    try {
      response = await withTimeout(
        (signal) =>
          this.client.complete(prompt, { json: options.strictSchema, signal }),
        this.timeoutMs,
        `Reasoning service did not answer within ${this.timeoutMs}ms`,
      );
    } catch (error) {
      this.logger.error(
        `Extraction failed for ${document.url}: ${errorMessage(error)}`,
      );
      throw new ExtractionFailedError(errorMessage(error), { cause: error });
    }

    const parsed = parseModelJson(response);
    let payload: ExtractionPayload;
    let modelEntities: JsonValue | undefined;
    let modelConfidence: JsonValue | undefined;

    if (parsed === undefined) {
      this.logger.warn(
        `Response for ${document.url} is not valid JSON; keeping raw text`,
      );
      payload = {
        kind: 'unstructured',
        rawText: response,
        parseFailed: true,
        note: 'The reasoning service answer could not be parsed as JSON',
      };
    } else if (options.structuredExtraction && isJsonObject(parsed)) {
      const { entities, confidence, ...data } = parsed;
      modelEntities = entities;
      modelConfidence = confidence;
      payload = classifyPayload(data);
    } else {
      payload = classifyPayload(parsed);
    }

    const metadata: ExtractionMetadata = {
      sourceUrl: document.url,
      instruction,
      method: 'ai-assisted',
      model: this.client.model,
      processingTimeMs: Date.now() - startTime,
      contentTruncated,
      generatedAt: new Date().toISOString(),
    };

    if (!options.structuredExtraction) {
      return { ...payload, metadata };
    }

    const entities: EntityBreakdown = mergeEntities(
      entitiesFromModel(modelEntities),
      detectEntities(document.text),
    );

    return {
      ...payload,
      metadata,
      entities,
      confidence: this.resolveConfidence(payload, modelConfidence),
    };
  }

  buildPrompt(
    document: NormalizedDocument,
    instruction: string,
    options: SemanticExtractionOptions,
  ): string {
    const content = document.text.slice(0, MAX_PROMPT_CONTENT_CHARS);

    const lines = [
      'Extract information from the web page below.',
      '',
      `Instruction: ${instruction}`,
      `Source URL: ${document.url}`,
      `Page title: ${document.title}`,
      '',
      'Page content:',
      content,
      '',
      'Answer with JSON only, shaped to answer the instruction. Use a list of objects for repeated records.',
    ];

    if (options.strictSchema) {
      lines.push(
        'Include exactly the fields the instruction asks for and no others. Use null for values the page does not contain.',
      );
    }

    if (options.structuredExtraction) {
      lines.push(
        'Answer with a JSON object. Add an "entities" object mapping entity categories (for example "people", "organizations", "locations") to arrays of strings, and a "confidence" number between 0 and 1.',
      );
    }

    return lines.join('\n');
  }

  private resolveConfidence(
    payload: ExtractionPayload,
    reported: JsonValue | undefined,
  ): number {
    if (typeof reported === 'number' && Number.isFinite(reported)) {
      // Some answers use a 0-10 scale
      const scaled = reported > 1 && reported <= 10 ? reported / 10 : reported;
      return Math.min(1, Math.max(0, scaled));
    }
    return payload.kind === 'unstructured'
      ? UNSTRUCTURED_CONFIDENCE
      : PARSED_CONFIDENCE;
  }
}
