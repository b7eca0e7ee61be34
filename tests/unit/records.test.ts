import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { ExtractionError, isExtractionError, toErrorRecord, toWireRecord } from '../../src/core/errors';
import { OutputWriter } from '../../src/output/writer';
import { parseArgs } from '../../src/index';

describe('error records', () => {
  it('keep the kind and message of pipeline errors', () => {
    const err = new ExtractionError('NavigationTimeout', 'Page navigation timed out.');
    expect(isExtractionError(err, 'NavigationTimeout')).toBe(true);
    expect(isExtractionError(err, 'FetchFailed')).toBe(false);
    expect(toErrorRecord(err)).toEqual({ status: 'error', kind: 'NavigationTimeout', error: 'Page navigation timed out.' });
  });

  it('mark anything else as unexpected', () => {
    expect(toErrorRecord(new TypeError('x is undefined'))).toEqual({
      status: 'error',
      kind: 'Unexpected',
      error: 'Unexpected extraction failure: x is undefined',
    });
    expect(toErrorRecord('plain string')).toEqual({
      status: 'error',
      kind: 'Unexpected',
      error: 'Unexpected extraction failure: plain string',
    });
  });

  it('serialize to the data itself or a lone error key', () => {
    expect(toWireRecord({ status: 'success', data: { title: 'Dev' } })).toEqual({ title: 'Dev' });
    expect(toWireRecord({ status: 'error', kind: 'JSONParseFailure', error: 'Failed to parse JSON response.' })).toEqual({
      error: 'Failed to parse JSON response.',
    });
  });
});

describe('OutputWriter', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'writer-test-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('writes one pretty record for json', async () => {
    const writer = new OutputWriter({ directory: dir, filename: 'job', format: 'json' });
    await writer.write({ title: 'Dev' });
    await writer.write({ title: 'Ops' });

    expect(writer.path()).toBe(path.join(dir, 'job.json'));
    await expect(fs.readFile(writer.path(), 'utf8')).resolves.toBe('{\n  "title": "Ops"\n}\n');
  });

  it('appends one line per record for jsonl', async () => {
    const writer = new OutputWriter({ directory: dir, filename: 'jobs', format: 'jsonl' });
    await writer.write({ title: 'Dev' });
    await writer.write({ error: 'Initial text extraction failed.' });

    await expect(fs.readFile(writer.path(), 'utf8')).resolves.toBe(
      '{"title":"Dev"}\n{"error":"Initial text extraction failed."}\n'
    );
  });

  it('keeps appending to a named jsonl file from separate writers', async () => {
    await new OutputWriter({ directory: dir, filename: 'runs', format: 'jsonl' }).write({ title: 'Dev' });
    const second = new OutputWriter({ directory: dir, filename: 'runs', format: 'jsonl' });
    await second.write({ title: 'Ops' });

    expect(second.path()).toBe(path.join(dir, 'runs.jsonl'));
    await expect(fs.readFile(second.path(), 'utf8')).resolves.toBe('{"title":"Dev"}\n{"title":"Ops"}\n');
  });
});

describe('parseArgs', () => {
  it('reads the url and options', () => {
    expect(parseArgs(['https://careers.example.com/jobs/42', '--out=out', '--format=jsonl'])).toEqual({
      ok: true,
      options: { url: 'https://careers.example.com/jobs/42', outDir: 'out', format: 'jsonl' },
    });
    expect(parseArgs(['4150892998'])).toEqual({ ok: true, options: { url: '4150892998', format: 'json' } });
  });

  it('reads the output file name', () => {
    expect(parseArgs(['4150892998', '--out=out', '--name=jobs', '--format=jsonl'])).toEqual({
      ok: true,
      options: { url: '4150892998', outDir: 'out', name: 'jobs', format: 'jsonl' },
    });
  });

  it('rejects missing or unknown input', () => {
    expect(parseArgs([])).toEqual({ ok: false, error: 'Missing URL' });
    expect(parseArgs(['u', '--format=csv'])).toEqual({ ok: false, error: 'Unknown format: csv' });
    expect(parseArgs(['u', '--verbose'])).toEqual({ ok: false, error: 'Unknown option: --verbose' });
    expect(parseArgs(['a', 'b'])).toEqual({ ok: false, error: 'Unexpected argument: b' });
  });
});
