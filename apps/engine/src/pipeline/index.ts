export * from './types';
export { TopicCorpus, TopicCorpusParts, buildCorpus, customTopic, toKeywordCollection, toLinkRecords, toTopicRecords } from './corpus';
export { compose, composeBlogPrompt, extractPromptInputs, leadKeywords, randomLinkSampler, PromptInputs, ComposedPrompt } from './compose';
export { GenerationEngine, GenerationEngineOptions, createGenerationEngine, renderGenerationError } from './engine';
export { BatchPipeline, BatchPipelineOptions, TopicGenerator, clampCount } from './batch';
export { runBlogGeneration, GenerationRunOptions, GenerationRunOutcome, CheckedGenerator } from './orchestrator';
export { extractMeta, BlogMeta } from './meta';
export { writeRunSummary, renderSummaryText, summaryFileBase, buildSummaryDocument, SummaryFiles, SummaryDocument } from './summary';
export { scanReportDirectory, parseBlogReport, buildCostReport, renderCostReport, CostReport, ParsedBlogReport } from './costReport';
export * from './cost';
