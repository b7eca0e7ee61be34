#!/usr/bin/env node
import type { OutputFormat } from './types/schema';
import { buildPipelineConfig, credentialsFromEnv, loadEnv } from './config/env';
import { ExtractionEngine } from './core/automation/engine';
import { toWireRecord } from './core/errors';
import { OutputWriter } from './output/writer';
import logger from './utils/logger';

export { ExtractionEngine, extractJob } from './core/automation/engine';
export type { EngineDependencies } from './core/automation/engine';
export { toWireRecord } from './core/errors';
export type { ExtractionRequest, StructuredRecord, WireRecord, JobData } from './types/extraction';

const USAGE = 'Usage: extract-job <url|job-id> [--out=<dir>] [--name=<file>] [--format=json|jsonl]';

export interface CliOptions {
  url: string;
  outDir?: string;
  /** File name without extension; reuse it to append jsonl records across runs. */
  name?: string;
  format: OutputFormat;
}

export type ParsedArgs = { ok: true; options: CliOptions } | { ok: false; error: string };

export function parseArgs(argv: readonly string[]): ParsedArgs {
  let url: string | undefined;
  let outDir: string | undefined;
  let name: string | undefined;
  let format: OutputFormat = 'json';

  for (const arg of argv) {
    if (arg.startsWith('--out=')) {
      outDir = arg.slice('--out='.length);
    } else if (arg.startsWith('--name=')) {
      name = arg.slice('--name='.length);
    } else if (arg.startsWith('--format=')) {
      const value = arg.slice('--format='.length);
      if (value !== 'json' && value !== 'jsonl') return { ok: false, error: `Unknown format: ${value}` };
      format = value;
    } else if (arg.startsWith('--')) {
      return { ok: false, error: `Unknown option: ${arg}` };
    } else if (url === undefined) {
      url = arg;
    } else {
      return { ok: false, error: `Unexpected argument: ${arg}` };
    }
  }

  if (!url) return { ok: false, error: 'Missing URL' };
  return { ok: true, options: { url, format, ...(outDir ? { outDir } : {}), ...(name ? { name } : {}) } };
}

/** Returns the process exit code: 0 for a structured record, 1 otherwise. */
export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<number> {
  const parsed = parseArgs(argv);
  if (!parsed.ok) {
    console.error(`${parsed.error}\n${USAGE}`);
    return 1;
  }

  const env = loadEnv(logger);
  const credentials = credentialsFromEnv(env);
  if (!credentials) {
    logger.error('No LLM API key found; set LLM_API_KEY, GROQ_API_KEY or OPENAI_API_KEY');
    return 1;
  }

  const engine = new ExtractionEngine(buildPipelineConfig(env), {}, logger.child({ level: env.LOG_LEVEL }));
  const record = await engine.run({ url: parsed.options.url, llmCredentials: credentials });
  const wire = toWireRecord(record);
  console.log(JSON.stringify(wire, null, 2));

  if (parsed.options.outDir) {
    const writer = new OutputWriter({
      directory: parsed.options.outDir,
      format: parsed.options.format,
      ...(parsed.options.name ? { filename: parsed.options.name } : {}),
    });
    await writer.write(wire);
    logger.info('Record written', { path: writer.path() });
  }
  return record.status === 'success' ? 0 : 1;
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      logger.error('Fatal error', err);
      process.exitCode = 1;
    }
  );
}
