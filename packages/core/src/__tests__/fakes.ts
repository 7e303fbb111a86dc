import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import type { MetadataClassifier } from '../agents/classification-agent';
import type { ChatCompletionClient, ChatCompletionOptions } from '../agents/llm-client';
import type { MetadataStandardizer } from '../agents/standards-agent';
import type { NormalizedMetadata, RawMetadata } from '../contracts';

export const chaseRaw: RawMetadata = {
  domain: 'Finances',
  category: 'Bank',
  doctype: 'bank statement',
  vendorRaw: 'JPMorgan Chase Bank, N.A.',
  dateRaw: 'January 15, 2024',
  subjectRaw: 'checking account',
};

export const chaseNormalized: NormalizedMetadata = {
  domain: 'Finances',
  category: 'Bank',
  doctype: 'bank_statement',
  vendorName: 'chase',
  date: '20240115',
  subject: 'checking',
};

export class FakeClassifier implements MetadataClassifier {
  readonly calls: Array<{ content: string; filename: string }> = [];

  constructor(private readonly raw: RawMetadata = chaseRaw) {}

  async classify(content: string, filename: string): Promise<RawMetadata> {
    this.calls.push({ content, filename });
    return this.raw;
  }
}

export class FakeStandardizer implements MetadataStandardizer {
  readonly calls: RawMetadata[] = [];

  constructor(private readonly normalized: NormalizedMetadata = chaseNormalized) {}

  async standardize(raw: RawMetadata): Promise<NormalizedMetadata> {
    this.calls.push(raw);
    return this.normalized;
  }
}

/** Answers each chat completion with the next queued response. */
export class FakeChatClient implements ChatCompletionClient {
  readonly requests: Array<{ messages: ChatCompletionMessageParam[]; options?: ChatCompletionOptions }> = [];

  constructor(private readonly responses: string[]) {}

  async chatCompletion(messages: ChatCompletionMessageParam[], options?: ChatCompletionOptions): Promise<string> {
    this.requests.push({ messages, options });
    const next = this.responses.shift();
    if (next === undefined) {
      throw new Error('FakeChatClient has no response queued');
    }
    return next;
  }
}
