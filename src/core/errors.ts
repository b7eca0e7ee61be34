import type { ErrorRecord, ExtractionErrorKind, JobData, StructuredRecord, WireRecord } from '../types/extraction';

export class ExtractionError extends Error {
  constructor(readonly kind: ExtractionErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ExtractionError';
  }
}

export function isExtractionError(err: unknown, kind?: ExtractionErrorKind): err is ExtractionError {
  return err instanceof ExtractionError && (kind === undefined || err.kind === kind);
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function successRecord(data: JobData): StructuredRecord {
  return { status: 'success', data };
}

export function errorRecord(kind: ExtractionErrorKind, error: string): ErrorRecord {
  return { status: 'error', kind, error };
}

/** Anything thrown inside the pipeline ends up here; callers only ever see records. */
export function toErrorRecord(err: unknown): ErrorRecord {
  if (err instanceof ExtractionError) return errorRecord(err.kind, err.message);
  return errorRecord('Unexpected', `Unexpected extraction failure: ${errorMessage(err)}`);
}

export function toWireRecord(record: StructuredRecord): WireRecord {
  return record.status === 'success' ? record.data : { error: record.error };
}
