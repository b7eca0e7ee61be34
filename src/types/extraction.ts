import { z } from 'zod';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(JsonValueSchema)])
);

export const JobDataSchema = z.record(JsonValueSchema);
export type JobData = z.infer<typeof JobDataSchema>;

export type ExtractionErrorKind =
  | 'BrowserUnavailable'
  | 'NavigationTimeout'
  | 'NavigationFailed'
  | 'InvalidJobId'
  | 'EmptyExtraction'
  | 'LLMCommunicationError'
  | 'JSONParseFailure'
  | 'FetchFailed'
  | 'Unexpected';

export interface LlmCredentials {
  apiKey: string;
  model: string;
  baseUrl?: string;
  temperature?: number;
}

export interface ExtractionRequest {
  readonly url: string;
  readonly llmCredentials: Readonly<LlmCredentials>;
}

export interface StabilizationState {
  scrollHeight: number;
  attemptCount: number;
  popupsClosed: number;
  converged: boolean;
}

export type SuccessRecord = { status: 'success'; data: JobData };
export type ErrorRecord = { status: 'error'; kind: ExtractionErrorKind; error: string };
export type StructuredRecord = SuccessRecord | ErrorRecord;

// Shape that leaves the process: the data itself, or a lone "error" key.
export type WireRecord = JobData | { error: string };
