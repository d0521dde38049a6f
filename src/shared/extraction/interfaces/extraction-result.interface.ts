export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type EntityBreakdown = Record<string, string[]>;

export interface ExtractionMetadata {
  sourceUrl: string;
  instruction: string;
  method: 'ai-assisted';
  model: string;
  processingTimeMs: number;
  contentTruncated: boolean;
  generatedAt: string;
}

export type ExtractionPayload =
  | { kind: 'tabular'; data: JsonObject; tableKeys: string[] }
  | { kind: 'key-value'; data: JsonObject }
  | { kind: 'entity-list'; items: JsonValue[] }
  | { kind: 'free-text'; text: string }
  | { kind: 'unstructured'; rawText: string; parseFailed: true; note: string };

export type ExtractionKind = ExtractionPayload['kind'];

export type ExtractionResult = ExtractionPayload & {
  metadata: ExtractionMetadata;
  entities?: EntityBreakdown;
  /** 0..1 */
  confidence?: number;
};

export interface SemanticExtractionOptions {
  structuredExtraction: boolean;
  strictSchema: boolean;
}
