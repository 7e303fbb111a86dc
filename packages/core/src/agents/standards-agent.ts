/**
 * StandardsAgent - applies naming conventions to raw metadata:
 * vendor slugs, YYYYMMDD dates, 1-3 word subjects, version markers.
 */
import { NormalizedMetadataSchema, type NormalizedMetadata, type RawMetadata } from '../contracts';
import { generateTaxonomyXml } from '../taxonomy';
import type { TaxonomyVocabulary } from '../taxonomy';
import { executeApiCall } from './api-call-helper';
import type { ChatCompletionClient } from './llm-client';
import { parseStructuredResponse } from './parsers';
import { buildStandardsSystemPrompt, buildStandardsUserPrompt } from './prompts/standards-agent-prompt';

export interface MetadataStandardizer {
  standardize(raw: RawMetadata): Promise<NormalizedMetadata>;
}

export class StandardsAgent implements MetadataStandardizer {
  constructor(
    private readonly llmClient: ChatCompletionClient,
    private readonly taxonomy?: TaxonomyVocabulary
  ) {}

  async standardize(raw: RawMetadata): Promise<NormalizedMetadata> {
    const messages = [
      { role: 'system' as const, content: buildStandardsSystemPrompt(generateTaxonomyXml(this.taxonomy)) },
      { role: 'user' as const, content: buildStandardsUserPrompt(raw) },
    ];

    const response = await executeApiCall(messages, this.llmClient, {
      reason: `Standardize metadata for vendor: ${raw.vendorRaw}`,
      json: true,
    });

    const normalized = parseStructuredResponse(response, NormalizedMetadataSchema, 'StandardsAgent');
    console.log(`[StandardsAgent] "${raw.vendorRaw}" -> ${normalized.vendorName}`);
    return normalized;
  }
}
