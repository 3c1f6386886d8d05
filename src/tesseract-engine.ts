import { createWorker, OEM, PSM, type Worker } from 'tesseract.js';
import type { OcrConfig } from './config.js';
import { RecognitionUnavailableError } from './errors.js';
import { encodePng } from './image-preprocessor.js';
import type { Logger } from './logger.js';
import { OcrEngine } from './ocr-engine.js';
import type { OcrCandidate, OcrResult, PreprocessedImage, Result } from './types.js';

const READOUT_CHARACTERS = '0123456789-, ';

/**
 * Tesseract LSTM recognizer restricted to the readout's character set.
 * The worker starts on first use and is reused for the whole process.
 */
export class TesseractOcrEngine extends OcrEngine {
  private worker: Worker | null = null;
  private initPromise: Promise<Worker> | null = null;

  constructor(config: OcrConfig, private readonly logger: Logger) {
    super(config);
  }

  private async getWorker(): Promise<Worker> {
    if (this.worker) return this.worker;
    if (this.initPromise) return this.initPromise;

    this.initPromise = (async () => {
      const worker = await createWorker(this.config.language, OEM.LSTM_ONLY, {
        langPath: this.config.langPath,
        logger: (m) => {
          if (m.status !== 'recognizing text') {
            this.logger.debug(`Tesseract: ${m.status}`, { progress: m.progress });
          }
        }
      });
      await worker.setParameters({
        tessedit_pageseg_mode: PSM.SINGLE_LINE,
        tessedit_char_whitelist: READOUT_CHARACTERS
      });
      this.worker = worker;
      this.logger.info('Tesseract worker ready', { language: this.config.language });
      return worker;
    })();

    try {
      return await this.initPromise;
    } catch (error) {
      this.initPromise = null;
      throw error;
    }
  }

  async recognize(image: PreprocessedImage): Promise<Result<OcrResult, RecognitionUnavailableError>> {
    let worker: Worker;
    try {
      worker = await this.getWorker();
    } catch (error) {
      return { ok: false, error: new RecognitionUnavailableError('Tesseract worker failed to start', error) };
    }

    try {
      const png = await encodePng(image);
      const { data } = await worker.recognize(png);

      const candidates: OcrCandidate[] = [];
      for (const line of data.lines ?? []) {
        const text = line.text.trim();
        if (!text) continue;
        // Map back from the upscaled image into readout-region pixels
        candidates.push({
          text,
          confidence: Math.max(0, Math.min(1, line.confidence / 100)),
          bounds: {
            x: line.bbox.x0 / image.scale,
            y: line.bbox.y0 / image.scale,
            width: (line.bbox.x1 - line.bbox.x0) / image.scale,
            height: (line.bbox.y1 - line.bbox.y0) / image.scale
          }
        });
      }

      const whole = data.text.trim();
      if (candidates.length === 0 && whole) {
        candidates.push({
          text: whole,
          confidence: Math.max(0, Math.min(1, data.confidence / 100)),
          bounds: { x: 0, y: 0, width: image.source.width, height: image.source.height }
        });
      }

      return { ok: true, value: candidates };
    } catch (error) {
      return { ok: false, error: new RecognitionUnavailableError('Tesseract recognition failed', error) };
    }
  }

  async terminate(): Promise<void> {
    if (this.worker) {
      await this.worker.terminate();
      this.worker = null;
      this.initPromise = null;
    }
  }
}
