/**
 * JSON-Schema-like document describing the shape the research agent must fill.
 */
export interface ExtractionSchema {
  readonly type: 'object';
  readonly properties: Record<string, unknown>;
  readonly required?: readonly string[];
  readonly description?: string;
  readonly [keyword: string]: unknown;
}

export type ToolKind = 'search' | 'scrape' | 'submit';

export interface ToolCallRequest {
  readonly id: string;
  readonly name: string;
  readonly args: Record<string, unknown>;
}

export interface ToolCallRecord {
  readonly callId: string;
  readonly toolName: string;
  readonly args: Record<string, unknown>;
  readonly result: string;
  readonly isError: boolean;
}

export type ResearchMessage =
  | { readonly role: 'human'; readonly content: string }
  | {
      readonly role: 'model';
      readonly content: string;
      readonly toolCalls: readonly ToolCallRequest[];
    }
  | { readonly role: 'tool'; readonly record: ToolCallRecord };

export type ExtractedInfo = Record<string, unknown>;

export interface SatisfactionVerdict {
  readonly isSatisfactory: boolean;
  readonly reasons: readonly string[];
  readonly improvementInstructions?: string;
}

export type ReflectionPolicy = 'submission-ends' | 'verdict-gated';

export interface ResearchRequest {
  readonly topic: string;
  readonly extractionSchema: ExtractionSchema;
}

export type ResearchStatus = 'submitted' | 'exhausted';

export interface ResearchResult {
  readonly topic: string;
  readonly info: ExtractedInfo | null;
  readonly iterations: number;
  readonly status: ResearchStatus;
  readonly verdict?: SatisfactionVerdict;
  readonly messages: readonly ResearchMessage[];
}
