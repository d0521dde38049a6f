import { ConfigService } from '@nestjs/config';
import {
  MAX_PROMPT_CONTENT_CHARS,
  SemanticExtractorService,
} from './semantic-extractor.service';
import { emptyDocument } from '@/shared/scraping/services/parser.service';
import type { NormalizedDocument } from '@/shared/scraping/interfaces/document.interface';
import { ExtractionFailedError } from '@/shared/common/errors/pipeline.errors';
import { FakeReasoningClient } from '@/testing/fake-reasoning-client';

const PLAIN = { structuredExtraction: false, strictSchema: false };

function documentWith(text: string): NormalizedDocument {
  return { ...emptyDocument('https://shop.test/catalog'), title: 'Catalog', text };
}

function extractorFor(
  client: FakeReasoningClient,
  config: Record<string, unknown> = {},
) {
  return new SemanticExtractorService(client, new ConfigService(config));
}

describe('SemanticExtractorService', () => {
  it('reads a fenced JSON answer with record lists as tabular', async () => {
    const client = FakeReasoningClient.answering(
      'Sure:\n```json\n{"products": [{"name": "Lamp", "price": 20}, {"name": "Desk", "price": 90}]}\n```',
    );

    const result = await extractorFor(client).extract(
      documentWith('Lamp 20 Desk 90'),
      'list products with prices',
      PLAIN,
    );

    expect(result).toMatchObject({
      kind: 'tabular',
      tableKeys: ['products'],
      data: {
        products: [
          { name: 'Lamp', price: 20 },
          { name: 'Desk', price: 90 },
        ],
      },
      metadata: {
        sourceUrl: 'https://shop.test/catalog',
        instruction: 'list products with prices',
        method: 'ai-assisted',
        model: 'fake-model',
        contentTruncated: false,
      },
    });
    expect(result.entities).toBeUndefined();
    expect(result.confidence).toBeUndefined();
  });

  it('classifies flat objects, lists and scalars', async () => {
    const extractor = (answer: string) =>
      extractorFor(FakeReasoningClient.answering(answer)).extract(
        documentWith('text'),
        'anything',
        PLAIN,
      );

    expect(await extractor('{"title": "Catalog", "count": 2}')).toMatchObject({
      kind: 'key-value',
      data: { title: 'Catalog', count: 2 },
    });
    expect(await extractor('["a", "b"]')).toMatchObject({
      kind: 'entity-list',
      items: ['a', 'b'],
    });
    expect(await extractor('"just a sentence"')).toMatchObject({
      kind: 'free-text',
      text: 'just a sentence',
    });
  });

  it('finds a JSON object embedded in prose', async () => {
    const client = FakeReasoningClient.answering(
      'Here is what I found: {"author": "Ada"} Hope that helps.',
    );

    const result = await extractorFor(client).extract(
      documentWith('by Ada'),
      'who wrote it',
      PLAIN,
    );

    expect(result).toMatchObject({ kind: 'key-value', data: { author: 'Ada' } });
  });

  it('keeps an unparseable answer as unstructured text', async () => {
    const client = FakeReasoningClient.answering('The page lists two lamps.');

    const result = await extractorFor(client).extract(
      documentWith('lamps'),
      'count lamps',
      PLAIN,
    );

    expect(result).toMatchObject({
      kind: 'unstructured',
      rawText: 'The page lists two lamps.',
      parseFailed: true,
    });
  });

  it('adds entities and confidence for structured extraction', async () => {
    const client = FakeReasoningClient.answering(
      '{"company": "Shop", "entities": {"people": ["Ada"]}, "confidence": 9}',
    );

    const result = await extractorFor(client).extract(
      documentWith('Contact sales@shop.test today'),
      'company details',
      { structuredExtraction: true, strictSchema: false },
    );

    expect(result).toMatchObject({
      kind: 'key-value',
      data: { company: 'Shop' },
      confidence: 0.9,
      entities: { people: ['Ada'], emails: ['sales@shop.test'] },
    });
    expect(client.calls[0].prompt).toContain('"entities"');
  });

  it('falls back to a low default confidence for unstructured answers', async () => {
    const result = await extractorFor(
      FakeReasoningClient.answering('no json here'),
    ).extract(documentWith('Call $12.50 now'), 'prices', {
      structuredExtraction: true,
      strictSchema: false,
    });

    expect(result.kind).toBe('unstructured');
    expect(result.confidence).toBe(0.2);
    expect(result.entities).toEqual({ prices: ['$12.50'] });
  });

  it('truncates long content and embeds instruction and URL in the prompt', async () => {
    const client = FakeReasoningClient.answering('{}');
    const text = 'a'.repeat(MAX_PROMPT_CONTENT_CHARS) + 'TAIL';

    const result = await extractorFor(client).extract(
      documentWith(text),
      'summarize',
      PLAIN,
    );

    const { prompt } = client.calls[0];
    expect(prompt).toContain('Instruction: summarize');
    expect(prompt).toContain('Source URL: https://shop.test/catalog');
    expect(prompt).toContain('a'.repeat(MAX_PROMPT_CONTENT_CHARS));
    expect(prompt).not.toContain('TAIL');
    expect(result.metadata.contentTruncated).toBe(true);
  });

  it('requests JSON mode for strict schemas', async () => {
    const client = FakeReasoningClient.answering('{"a": 1}');

    await extractorFor(client).extract(documentWith('x'), 'a', {
      structuredExtraction: false,
      strictSchema: true,
    });

    expect(client.calls[0].options.json).toBe(true);
    expect(client.calls[0].prompt).toContain('Include exactly the fields');
  });

  it('fails when the reasoning service errors', async () => {
    const client = new FakeReasoningClient(async () => {
      throw new Error('quota exceeded');
    });

    const attempt = extractorFor(client).extract(documentWith('x'), 'a', PLAIN);

    await expect(attempt).rejects.toBeInstanceOf(ExtractionFailedError);
    await expect(attempt).rejects.toMatchObject({
      code: 'EXTRACTION_FAILED',
      message: 'quota exceeded',
    });
  });

  it('fails when the reasoning service does not answer in time', async () => {
    const client = new FakeReasoningClient(() => new Promise<string>(() => {}));

    await expect(
      extractorFor(client, { GEMINI_TIMEOUT_MS: 20 }).extract(
        documentWith('x'),
        'a',
        PLAIN,
      ),
    ).rejects.toMatchObject({
      code: 'EXTRACTION_FAILED',
      message: 'Reasoning service did not answer within 20ms',
    });
  });
});
