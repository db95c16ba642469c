/**
 * Prompt Composer
 *
 * Extracts the keywords and link sample for one generation call and
 * renders the blog prompt from them.
 */

import { BLOG_PROMPT } from '../providers/ai/prompts';
import { KeywordCollection, LinkRecord, LinkSampler, TopicRecord } from './types';

export const LEAD_KEYWORD_COUNT = 5;
export const LINK_SAMPLE_SIZE = 3;

/**
 * The single extraction shared by the prompt and the result
 */
export interface PromptInputs {
    seoKeywords: string[];
    llmKeywords: string[];
    links: LinkRecord[];
}

export interface ComposedPrompt {
    prompt: string;
    inputs: PromptInputs;
}

/**
 * Pseudorandom sample without replacement (partial Fisher-Yates)
 */
export const randomLinkSampler: LinkSampler = (links, count) => {
    const pool = [...links];
    const size = Math.min(count, pool.length);
    for (let i = 0; i < size; i++) {
        const j = i + Math.floor(Math.random() * (pool.length - i));
        [pool[i], pool[j]] = [pool[j], pool[i]];
    }
    return pool.slice(0, size);
};

/**
 * First keywords of the first category
 */
export function leadKeywords(collection: KeywordCollection, count: number = LEAD_KEYWORD_COUNT): string[] {
    const first = collection.categories[0];
    return first ? first.keywords.slice(0, count) : [];
}

export function extractPromptInputs(
    seoKeywords: KeywordCollection,
    llmKeywords: KeywordCollection,
    links: readonly LinkRecord[],
    sampler: LinkSampler = randomLinkSampler
): PromptInputs {
    const sampleSize = Math.min(LINK_SAMPLE_SIZE, links.length);
    return {
        seoKeywords: leadKeywords(seoKeywords),
        llmKeywords: leadKeywords(llmKeywords),
        links: sampler(links, sampleSize).slice(0, sampleSize),
    };
}

/**
 * Render the prompt for a topic from already extracted inputs
 */
export function composeBlogPrompt(topic: TopicRecord, inputs: PromptInputs): string {
    return BLOG_PROMPT({
        topic: topic.topic,
        description: topic.description,
        sourceUrl: topic.sourceUrl,
        seoKeywords: inputs.seoKeywords,
        llmKeywords: inputs.llmKeywords,
        links: inputs.links,
    });
}

export function compose(
    topic: TopicRecord,
    seoKeywords: KeywordCollection,
    llmKeywords: KeywordCollection,
    links: readonly LinkRecord[],
    sampler: LinkSampler = randomLinkSampler
): ComposedPrompt {
    const inputs = extractPromptInputs(seoKeywords, llmKeywords, links, sampler);
    return { prompt: composeBlogPrompt(topic, inputs), inputs };
}

export default { compose, composeBlogPrompt, extractPromptInputs, leadKeywords, randomLinkSampler };
