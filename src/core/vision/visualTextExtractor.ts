import { randomUUID } from 'node:crypto';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { PageHandle } from '../browser/pageHandle';
import type { OcrEngine } from './ocr';
import type { ImagePreprocessor } from './preprocess';
import { errorMessage } from '../errors';
import defaultLogger, { Logger } from '../../utils/logger';

export class VisualTextExtractor {
  constructor(
    private ocr: OcrEngine,
    private preprocess: ImagePreprocessor,
    private tempDir: string = os.tmpdir(),
    private logger: Logger = defaultLogger.child({ name: 'vision' })
  ) {}

  /**
   * Screenshot → preprocessing → OCR. Any failure gives an empty string; the
   * screenshot file never outlives the call.
   */
  async extract(page: PageHandle): Promise<string> {
    const file = path.join(this.tempDir, `capture-${randomUUID()}.png`);
    try {
      await page.screenshot(file);
      const image = await fs.readFile(file);
      const text = await this.ocr.recognize(await this.preprocess(image));
      this.logger.info('Text extraction completed', { chars: text.length });
      return text;
    } catch (err) {
      this.logger.warn('Text extraction failed', { error: errorMessage(err) });
      return '';
    } finally {
      await fs.rm(file, { force: true }).catch((err: unknown) =>
        this.logger.warn('Could not delete screenshot', { file, error: errorMessage(err) })
      );
    }
  }
}
