import type { ExtractedInfo, ExtractionSchema } from '@quarry/shared/src/types/research.types.js';

export const DEFAULT_RESEARCH_PROMPT = `You are doing web research on behalf of a user. You are trying to figure out this information:

<info>
{info}
</info>

You have access to the following tools:

- \`search\`: call a search tool and get back some results
- \`scrape\`: scrape a website and get relevant notes about the given request. This will update the notes above.
- \`Info\`: call this when you are done and have gathered all the relevant info

Here is the information you have about the topic you are researching:

Topic: {topic}`;

export const CORRECTIVE_MESSAGE = 'Please respond by calling one of the provided tools.';

/** Fills the `{info}` and `{topic}` placeholders of a research prompt template. */
export function buildResearchPrompt(
  template: string,
  topic: string,
  extractionSchema: ExtractionSchema,
): string {
  return template
    .replaceAll('{info}', JSON.stringify(extractionSchema, null, 2))
    .replaceAll('{topic}', topic);
}

export const SATISFACTION_JUDGE_PROMPT = `You are a satisfaction judge evaluating the quality and completeness of extracted information.

Evaluate whether the extracted information is satisfactory and complete according to the extraction schema.

You must provide:
1. At least 3 reasons for your evaluation (field "reasons")
2. A clear decision on whether the info is satisfactory (field "isSatisfactory")
3. If not satisfactory, specific instructions on what needs to be improved (field "improvementInstructions")

Respond with a JSON object only.`;

export function buildJudgeMessage(
  topic: string,
  extractionSchema: ExtractionSchema,
  info: ExtractedInfo | null,
): string {
  return `Extraction Schema:
${JSON.stringify(extractionSchema, null, 2)}

Topic: ${topic}

Current Extracted Info:
${info ? JSON.stringify(info, null, 2) : 'No info extracted yet'}`;
}
