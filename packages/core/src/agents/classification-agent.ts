/**
 * ClassificationAgent - reads document text and reports raw metadata
 * (domain, category, doctype, vendor/date/subject as printed).
 */
import { RawMetadataSchema, type RawMetadata } from '../contracts';
import { generateTaxonomyXml } from '../taxonomy';
import type { TaxonomyVocabulary } from '../taxonomy';
import { executeApiCall } from './api-call-helper';
import type { ChatCompletionClient } from './llm-client';
import { parseStructuredResponse } from './parsers';
import {
  buildClassificationSystemPrompt,
  buildClassificationUserPrompt,
} from './prompts/classification-agent-prompt';

export interface MetadataClassifier {
  classify(content: string, filename: string): Promise<RawMetadata>;
}

export class ClassificationAgent implements MetadataClassifier {
  constructor(
    private readonly llmClient: ChatCompletionClient,
    private readonly taxonomy?: TaxonomyVocabulary
  ) {}

  async classify(content: string, filename: string): Promise<RawMetadata> {
    console.log(`[ClassificationAgent] Classifying ${filename} (${content.length} chars)`);

    const messages = [
      { role: 'system' as const, content: buildClassificationSystemPrompt(generateTaxonomyXml(this.taxonomy)) },
      { role: 'user' as const, content: buildClassificationUserPrompt(filename, content) },
    ];

    const response = await executeApiCall(messages, this.llmClient, {
      reason: `Classify document: ${filename}`,
      json: true,
    });

    const raw = parseStructuredResponse(response, RawMetadataSchema, 'ClassificationAgent');
    console.log(
      `[ClassificationAgent] ${filename}: ${raw.domain}/${raw.category}/${raw.doctype} from "${raw.vendorRaw}"`
    );
    return raw;
  }
}
