/**
 * LLM Extraction Service
 *
 * The one place raw LLM output enters the pipeline. Responses are validated
 * with zod and converted into typed entities and relationships here; nothing
 * loosely typed travels further in.
 *
 * - Invalid envelope or empty response: MalformedExtractionError (retried
 *   like any other extraction-call failure)
 * - Invalid individual item: quarantined (dropped and counted), the rest of
 *   the payload is kept
 */

import { GoogleGenerativeAI, SchemaType } from '@google/generative-ai';
import type { ResponseSchema } from '@google/generative-ai';
import { z } from 'zod';
import { log, describeError } from './logger';
import { ExtractionCallError, MalformedExtractionError } from './errors';
import { buildExtractionPrompt } from './utils/promptBuilder';
import type {
  ChunkExtraction,
  DocumentInsights,
  ExtractedEntity,
  ExtractedRelationship,
  KeyMoment,
  Sentiment,
  Topic
} from './types';

export interface ExtractionRequest {
  text: string;
  chunkIndex: number;
  totalChunks: number;
  /** Ask for topics, key moments and sentiment (whole-transcript chunks only) */
  includeDocumentInsights: boolean;
  signal?: AbortSignal;
}

export interface ExtractionService {
  /**
   * @throws ExtractionCallError when the call fails or the answer is unusable
   */
  extract(request: ExtractionRequest): Promise<ChunkExtraction>;
}

// =============================================================================
// Boundary Validation
// =============================================================================

const confidence = z.number().min(0).max(1);
const evidence = z
  .string()
  .nullish()
  .transform(value => (value && value.trim() ? value.trim() : null));

const EntityItemSchema = z.object({
  name: z.string().trim().min(1),
  type: z.string().trim().min(1),
  confidence,
  evidence
});

const RelationshipItemSchema = z.object({
  subject: z.string().trim().min(1),
  predicate: z.string().trim().min(1),
  object: z.string().trim().min(1),
  confidence,
  evidence
});

const TopicItemSchema = z.object({
  name: z.string().trim().min(1),
  relevance: confidence
});

const KeyMomentItemSchema = z.object({
  description: z.string().trim().min(1),
  timestamp: z.number().nonnegative(),
  significance: confidence
});

const SentimentSchema = z.object({
  overall: z.number().min(-1).max(1),
  byTopic: z.record(z.number().min(-1).max(1)).default({})
});

const EnvelopeSchema = z.object({
  entities: z.array(z.unknown()).default([]),
  relationships: z.array(z.unknown()).default([]),
  topics: z.array(z.unknown()).optional(),
  keyMoments: z.array(z.unknown()).optional(),
  sentiment: z.unknown().optional()
});

/**
 * Remove a markdown code fence the model sometimes wraps JSON in.
 */
export function stripCodeFences(text: string): string {
  return text.replace(/```json\s*|\s*```/g, '').trim();
}

function parseItems<T>(items: unknown[], schema: z.ZodType<T, z.ZodTypeDef, unknown>): { kept: T[]; dropped: number } {
  const kept: T[] = [];
  let dropped = 0;
  for (const item of items) {
    const parsed = schema.safeParse(item);
    if (parsed.success) {
      kept.push(parsed.data);
    } else {
      dropped++;
    }
  }
  return { kept, dropped };
}

/**
 * Validate a raw LLM response and convert it to a typed ChunkExtraction.
 *
 * @throws MalformedExtractionError when the response is empty, is not JSON,
 *   or is not an extraction object
 */
export function parseExtractionPayload(
  raw: string,
  chunkIndex: number,
  includeDocumentInsights = false
): ChunkExtraction {
  const cleaned = stripCodeFences(raw);
  const preview = cleaned.slice(0, 200);
  if (!cleaned) {
    throw new MalformedExtractionError(`Empty extraction response for chunk ${chunkIndex}`, chunkIndex, preview);
  }

  let json: unknown;
  try {
    json = JSON.parse(cleaned);
  } catch (error) {
    throw new MalformedExtractionError(
      `Extraction response for chunk ${chunkIndex} is not JSON: ${describeError(error)}`,
      chunkIndex,
      preview
    );
  }

  const envelope = EnvelopeSchema.safeParse(json);
  if (!envelope.success) {
    throw new MalformedExtractionError(
      `Extraction response for chunk ${chunkIndex} does not match the schema: ${envelope.error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ')}`,
      chunkIndex,
      preview
    );
  }

  const entityItems = parseItems(envelope.data.entities, EntityItemSchema);
  const relationshipItems = parseItems(envelope.data.relationships, RelationshipItemSchema);

  const entities: ExtractedEntity[] = entityItems.kept.map(item => ({ ...item, sourceChunk: chunkIndex }));
  const relationships: ExtractedRelationship[] = relationshipItems.kept.map(item => ({
    ...item,
    sourceChunk: chunkIndex
  }));

  let quarantined = entityItems.dropped + relationshipItems.dropped;
  let insights: DocumentInsights | null = null;

  if (includeDocumentInsights) {
    const topics = parseItems<Topic>(envelope.data.topics ?? [], TopicItemSchema);
    const keyMoments = parseItems<KeyMoment>(envelope.data.keyMoments ?? [], KeyMomentItemSchema);
    let sentiment: Sentiment | null = null;
    if (envelope.data.sentiment !== undefined && envelope.data.sentiment !== null) {
      const parsedSentiment = SentimentSchema.safeParse(envelope.data.sentiment);
      if (parsedSentiment.success) {
        sentiment = parsedSentiment.data;
      } else {
        quarantined++;
      }
    }
    quarantined += topics.dropped + keyMoments.dropped;
    insights = { topics: topics.kept, keyMoments: keyMoments.kept, sentiment };
  }

  if (quarantined > 0) {
    log.warn('[Extraction] Quarantined invalid items', { chunkIndex, quarantined, preview });
  }

  return { chunkIndex, entities, relationships, insights, quarantined };
}

// =============================================================================
// Gemini
// =============================================================================

const ENTITY_SCHEMA: ResponseSchema = {
  type: SchemaType.OBJECT,
  properties: {
    name: { type: SchemaType.STRING },
    type: { type: SchemaType.STRING },
    confidence: { type: SchemaType.NUMBER },
    evidence: { type: SchemaType.STRING, nullable: true }
  },
  required: ['name', 'type', 'confidence']
};

const RELATIONSHIP_SCHEMA: ResponseSchema = {
  type: SchemaType.OBJECT,
  properties: {
    subject: { type: SchemaType.STRING },
    predicate: { type: SchemaType.STRING },
    object: { type: SchemaType.STRING },
    confidence: { type: SchemaType.NUMBER },
    evidence: { type: SchemaType.STRING, nullable: true }
  },
  required: ['subject', 'predicate', 'object', 'confidence']
};

export function buildResponseSchema(includeDocumentInsights: boolean): ResponseSchema {
  const properties: Record<string, ResponseSchema> = {
    entities: { type: SchemaType.ARRAY, items: ENTITY_SCHEMA },
    relationships: { type: SchemaType.ARRAY, items: RELATIONSHIP_SCHEMA }
  };

  if (includeDocumentInsights) {
    properties.topics = {
      type: SchemaType.ARRAY,
      items: {
        type: SchemaType.OBJECT,
        properties: {
          name: { type: SchemaType.STRING },
          relevance: { type: SchemaType.NUMBER }
        },
        required: ['name', 'relevance']
      }
    };
    properties.keyMoments = {
      type: SchemaType.ARRAY,
      items: {
        type: SchemaType.OBJECT,
        properties: {
          description: { type: SchemaType.STRING },
          timestamp: { type: SchemaType.NUMBER },
          significance: { type: SchemaType.NUMBER }
        },
        required: ['description', 'timestamp', 'significance']
      }
    };
    properties.sentiment = {
      type: SchemaType.OBJECT,
      properties: {
        overall: { type: SchemaType.NUMBER },
        byTopic: {
          type: SchemaType.ARRAY,
          items: {
            type: SchemaType.OBJECT,
            properties: {
              topic: { type: SchemaType.STRING },
              score: { type: SchemaType.NUMBER }
            },
            required: ['topic', 'score']
          }
        }
      },
      required: ['overall']
    };
  }

  return {
    type: SchemaType.OBJECT,
    properties,
    required: ['entities', 'relationships']
  };
}

/**
 * Gemini's schema language has no maps, so per-topic sentiment comes back as
 * a list of { topic, score } pairs.
 */
function normalizeSentimentShape(json: unknown): unknown {
  if (typeof json !== 'object' || json === null || !('sentiment' in json)) {
    return json;
  }
  const { sentiment } = json;
  if (typeof sentiment !== 'object' || sentiment === null || !('byTopic' in sentiment)) {
    return json;
  }
  const { byTopic } = sentiment;
  if (!Array.isArray(byTopic)) {
    return json;
  }
  const mapped: Record<string, unknown> = {};
  for (const entry of byTopic) {
    if (typeof entry === 'object' && entry !== null && 'topic' in entry && 'score' in entry && typeof entry.topic === 'string') {
      mapped[entry.topic] = entry.score;
    }
  }
  return { ...json, sentiment: { ...sentiment, byTopic: mapped } };
}

export interface GeminiExtractionServiceOptions {
  apiKey: string;
  model?: string;
}

export class GeminiExtractionService implements ExtractionService {
  private readonly genAI: GoogleGenerativeAI;
  private readonly modelName: string;

  constructor(options: GeminiExtractionServiceOptions) {
    if (!options.apiKey) {
      throw new Error('GEMINI_API_KEY not provided');
    }
    this.genAI = new GoogleGenerativeAI(options.apiKey);
    this.modelName = options.model ?? 'gemini-2.5-flash';
  }

  async extract(request: ExtractionRequest): Promise<ChunkExtraction> {
    const model = this.genAI.getGenerativeModel({
      model: this.modelName,
      generationConfig: {
        responseMimeType: 'application/json',
        responseSchema: buildResponseSchema(request.includeDocumentInsights),
        temperature: 0
      }
    });

    const prompt = buildExtractionPrompt(request);
    const startTime = Date.now();

    let responseText: string;
    try {
      const result = await model.generateContent(prompt, { signal: request.signal });
      responseText = result.response.text();

      const usage = result.response.usageMetadata;
      log.info('[Extraction] Gemini response received', {
        chunkIndex: request.chunkIndex,
        durationMs: Date.now() - startTime,
        inputTokens: usage?.promptTokenCount ?? 0,
        outputTokens: usage?.candidatesTokenCount ?? 0
      });
    } catch (error) {
      throw new ExtractionCallError(
        `Gemini extraction failed for chunk ${request.chunkIndex}: ${describeError(error)}`,
        request.chunkIndex,
        { cause: error }
      );
    }

    return parseExtractionPayload(
      normalizeGeminiJson(responseText),
      request.chunkIndex,
      request.includeDocumentInsights
    );
  }
}

/**
 * Re-serialize Gemini JSON with sentiment.byTopic turned back into a map.
 * Text that is not JSON is passed through for the boundary to reject.
 */
export function normalizeGeminiJson(responseText: string): string {
  const cleaned = stripCodeFences(responseText);
  try {
    return JSON.stringify(normalizeSentimentShape(JSON.parse(cleaned)));
  } catch {
    return cleaned;
  }
}
