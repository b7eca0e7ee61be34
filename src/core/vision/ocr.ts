import path from 'node:path';
import { createWorker, OEM, PSM } from 'tesseract.js';
import type { VisionConfig } from '../../types/schema';

export interface OcrEngine {
  recognize(image: Buffer): Promise<string>;
}

/** Language data shipped on npm, so recognition never reaches the network. */
export function bundledLangPath(): string {
  const pkg = require.resolve('@tesseract.js-data/eng/package.json');
  return path.join(path.dirname(pkg), '4.0.0_best_int');
}

/**
 * tesseract.js with the default engine and "single uniform block of text"
 * segmentation. A worker lives for one recognition only.
 */
export class TesseractOcrEngine implements OcrEngine {
  constructor(private cfg: Pick<VisionConfig, 'language' | 'langPath'>) {}

  async recognize(image: Buffer): Promise<string> {
    const worker = await createWorker(this.cfg.language, OEM.DEFAULT, {
      langPath: this.cfg.langPath ?? bundledLangPath(),
      cacheMethod: 'none',
      gzip: true,
    });
    try {
      await worker.setParameters({ tessedit_pageseg_mode: PSM.SINGLE_BLOCK });
      const { data } = await worker.recognize(image);
      return data.text;
    } finally {
      await worker.terminate();
    }
  }
}
