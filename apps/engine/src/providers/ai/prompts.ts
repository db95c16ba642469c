/**
 * Prompt Templates for Blog Generation
 *
 * All prompts are centralized here for easy modification.
 * Bump PROMPT_VERSION whenever the template text changes.
 */

export const PROMPT_VERSION = 'blog-v2';

export const SYSTEM_PROMPT = 'You are an expert SEO blog writer specializing in AI and technology content. '
    + 'You create engaging, well-structured, and highly optimized blog posts.';

export const CONNECTION_TEST_PROMPT = "Say 'Connection successful!'";

export const META_TITLE_PREFIX = 'META_TITLE:';
export const META_DESCRIPTION_PREFIX = 'META_DESCRIPTION:';

export interface BlogPromptInput {
    topic: string;
    description: string;
    sourceUrl: string;
    seoKeywords: readonly string[];
    llmKeywords: readonly string[];
    links: ReadonlyArray<{ name: string; url: string }>;
}

export const BLOG_PROMPT = (input: BlogPromptInput): string => `
Write a comprehensive, SEO-optimized blog post about "${input.topic}".

TOPIC DETAILS:
- Main Topic: ${input.topic}
- Context: ${input.description}
- Reference: ${input.sourceUrl}

SEO REQUIREMENTS:
- Target these SEO keywords naturally: ${input.seoKeywords.join(', ')}
- Include these LLM-optimized phrases: ${input.llmKeywords.join(', ')}
- Target 90+ SEMrush SEO score
- 1500-2000 words
- Keyword density: 1-2%

CONTENT STRUCTURE:
1. Compelling meta title (max 60 characters)
2. Meta description (max 160 characters)
3. H1 title
4. Introduction with hook
5. 4-5 H2 sections with H3 subsections
6. Include these internal links naturally:
${input.links.map(link => `- ${link.name}: ${link.url}`).join('\n')}
7. Add [IMAGE PLACEHOLDER: descriptive alt text] in 3 relevant places
8. FAQ section with 5 questions
9. Strong conclusion with CTA

WRITING STYLE:
- Professional but engaging
- Clear, actionable insights
- Include statistics and examples
- Optimize for both human readers and AI search
- Use transition words for flow
- Include bullet points and numbered lists where appropriate

OUTPUT FORMAT:
${META_TITLE_PREFIX} [60 char title]
${META_DESCRIPTION_PREFIX} [160 char description]

# [H1 Title]

[Introduction paragraph with hook]

## [H2 Section 1]
[Content with H3 subsections if needed]
[IMAGE PLACEHOLDER: descriptive alt text]

## [H2 Section 2]
[Content]

## [H2 Section 3]
[Content]
[IMAGE PLACEHOLDER: descriptive alt text]

## [H2 Section 4]
[Content]

## [H2 Section 5]
[Content]
[IMAGE PLACEHOLDER: descriptive alt text]

## Frequently Asked Questions

${[1, 2, 3, 4, 5].map(n => `**Q${n}: [Question]**\nA: [Answer]`).join('\n\n')}

## Conclusion

[Strong conclusion with clear CTA]

Generate the complete blog post following this structure exactly.
`;
