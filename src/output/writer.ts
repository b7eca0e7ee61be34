import fs from 'node:fs';
import path from 'node:path';
import type { OutputFormat, OutputTarget } from '../types/schema';
import type { WireRecord } from '../types/extraction';


export class OutputWriter {
  private filePath: string;
  private format: OutputFormat;

  constructor(target: OutputTarget) {
    const dir = target.directory || 'data';
    const filename = target.filename || `job_${Date.now()}`;
    this.format = target.format ?? 'json';
    this.filePath = path.join(dir, `${filename}.${this.format}`);
    fs.mkdirSync(dir, { recursive: true });
  }

  /** json overwrites the file with one pretty record; jsonl appends one line per record. */
  async write(record: WireRecord): Promise<void> {
    if (this.format === 'json') {
      await fs.promises.writeFile(this.filePath, JSON.stringify(record, null, 2) + '\n');
      return;
    }
    await fs.promises.appendFile(this.filePath, JSON.stringify(record) + '\n');
  }

  path() { return this.filePath; }
}
