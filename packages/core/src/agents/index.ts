export {
  LLMClient,
  DEFAULT_MODELS,
  createLLMClient,
  detectLLMProvider,
  getProviderDisplayName,
  mapToOpenAIModel,
} from './llm-client';
export type { ChatCompletionClient, ChatCompletionOptions, LLMClientConfig, LLMProvider } from './llm-client';
export { executeApiCall } from './api-call-helper';
export type { ApiCallOptions } from './api-call-helper';
export { parseJsonObject, parseStructuredResponse, repairJson } from './parsers';
export { ClassificationAgent } from './classification-agent';
export type { MetadataClassifier } from './classification-agent';
export { StandardsAgent } from './standards-agent';
export type { MetadataStandardizer } from './standards-agent';
export { canonicalizeTaxonomy, processDocument } from './pipeline';
export type { CanonicalizeOptions, PipelineDependencies, PipelineResult } from './pipeline';
export { ClassificationOrchestrator, describeNamingPolicy } from './classification-orchestrator';
export type { BatchClassification, ClassificationOrchestratorOptions, NamingPolicy } from './classification-orchestrator';
