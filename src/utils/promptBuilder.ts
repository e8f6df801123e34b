/**
 * Prompt Builder for chunk extraction
 *
 * Constructs the Gemini prompt for one transcript chunk. The response shape
 * itself is enforced by the responseSchema; the prompt only explains what
 * belongs in each field and how confident to be.
 */

export interface ExtractionPromptInput {
  /** Rendered transcript lines, `[MM:SS] SPEAKER: text` */
  text: string;
  chunkIndex: number;
  totalChunks: number;
  includeDocumentInsights: boolean;
}

/**
 * Build the extraction prompt for one chunk.
 */
export function buildExtractionPrompt(input: ExtractionPromptInput): string {
  const position = input.totalChunks > 1
    ? `This is part ${input.chunkIndex + 1} of ${input.totalChunks} of a longer transcript. Extract only what this part says.`
    : 'This is the complete transcript.';

  const insightsInstructions = input.includeDocumentInsights
    ? `
## Document Insights
4. topics: The main topics of the conversation, each with a relevance from 0 to 1
5. keyMoments: Notable moments, each with a description, its timestamp in seconds and a significance from 0 to 1
6. sentiment: Overall sentiment from -1 (negative) to 1 (positive), plus a score per topic`
    : '';

  return `You are extracting structured knowledge from an audio transcript.
${position}

Each line is formatted as [MM:SS] SPEAKER: text.

## Entities
1. entities: People, organizations, places, products and concepts that are MENTIONED
   - name: As written in the transcript
   - type: One of PERSON, ORGANIZATION, LOCATION, PRODUCT, CONCEPT, EVENT
   - confidence: 0 to 1, how certain you are this is a real, correctly typed entity
   - evidence: The short quote that supports it

## Relationships
2. relationships: Facts connecting two entities, as subject / predicate / object
   - confidence: 0 to 1; only state relationships the transcript makes explicit
   - evidence: The short quote that supports it
3. Never infer a relationship from speaker labels alone
${insightsInstructions}

Important:
- Speaker labels (SPEAKER_00, SPEAKER_01) are not entities
- Be conservative with confidence; do not invent entities that are not in the text
- Return empty arrays when nothing qualifies

TRANSCRIPT:
${input.text}`;
}
