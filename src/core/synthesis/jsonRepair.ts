import * as JSON5 from 'json5';
import { JobDataSchema, type JobData } from '../../types/extraction';

/**
 * One pass over the model's text. Receives the previous stage's output and returns
 * the next candidate, or `null` when the stage cannot produce one.
 */
export type RepairStage = {
  name: string;
  apply: (input: string) => string | null;
};

export type RepairResult = { stage: string; text: string; data: JobData };

const DIGIT_GROUP_COMMA = /(?<=\d),(?=\d)/g;
const BARE_KEY = /([{[,]\s*)([A-Za-z0-9_]+)\s*:/g;
const TRAILING_COMMA = /,(?:\s*,)*(\s*[}\]])/g;
const ESCAPED_KEY = /\\*"([^"\\]+)\\*"\s*:/g;

function parseLiteral(input: string): unknown {
  try {
    return JSON5.parse(input);
  } catch {
    return undefined;
  }
}

/**
 * Reads the whole reply as an object literal (single quotes, bare keys, trailing
 * commas) and rewrites it as JSON. Valid JSON and anything JSON5 rejects pass through.
 */
export function normalizeLiteral(input: string): string {
  if (parseJsonObject(input)) return input;
  const literal = JobDataSchema.safeParse(parseLiteral(input));
  return literal.success ? JSON.stringify(literal.data) : input;
}

export function extractObjectBlock(input: string): string | null {
  const match = /\{[\s\S]*\}/.exec(input);
  return match ? match[0] : null;
}

export function stripDigitGroupCommas(input: string): string {
  return input.replace(DIGIT_GROUP_COMMA, '');
}

export function quoteBareKeys(input: string): string {
  return input.replace(BARE_KEY, '$1"$2":');
}

export function removeTrailingCommas(input: string): string {
  return input.replace(TRAILING_COMMA, '$1');
}

export function collapseEscapedKeyQuotes(input: string): string {
  let current = input;
  for (;;) {
    const next = current.replace(ESCAPED_KEY, '"$1":');
    if (next === current) return current;
    current = next;
  }
}

export const DEFAULT_REPAIR_STAGES: readonly RepairStage[] = [
  { name: 'direct', apply: normalizeLiteral },
  { name: 'object-block', apply: extractObjectBlock },
  {
    name: 'syntax-cleanup',
    apply: (input) => removeTrailingCommas(quoteBareKeys(stripDigitGroupCommas(input))),
  },
  { name: 'key-escapes', apply: collapseEscapedKeyQuotes },
];

/** Parses text as a JSON object; arrays, scalars and invalid JSON give `null`. */
export function parseJsonObject(text: string): JobData | null {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return null;
  }
  const parsed = JobDataSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

/**
 * Runs the stages in order, each on the previous stage's output, and stops at the
 * first output that parses to an object.
 */
export function repairJson(
  response: string,
  stages: readonly RepairStage[] = DEFAULT_REPAIR_STAGES
): RepairResult | null {
  let candidate = response;
  for (const stage of stages) {
    const next = stage.apply(candidate);
    if (next === null) return null;
    candidate = next;
    const data = parseJsonObject(candidate);
    if (data) return { stage: stage.name, text: candidate, data };
  }
  return null;
}

export function repairJsonText(response: string, stages?: readonly RepairStage[]): string | null {
  return repairJson(response, stages)?.text ?? null;
}
