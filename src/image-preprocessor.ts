import sharp from 'sharp';
import type { PreprocessConfig } from './config.js';
import { InvalidRegionError } from './errors.js';
import type { Frame, PreprocessedImage, Region, Result } from './types.js';

export function regionWithin(region: Region, width: number, height: number): boolean {
  return (
    Number.isInteger(region.x) &&
    Number.isInteger(region.y) &&
    Number.isInteger(region.width) &&
    Number.isInteger(region.height) &&
    region.x >= 0 &&
    region.y >= 0 &&
    region.width > 0 &&
    region.height > 0 &&
    region.x + region.width <= width &&
    region.y + region.height <= height
  );
}

/**
 * Turns the coordinate readout of a frame into a binary, upscaled image:
 * crop, greyscale, contrast stretch, threshold (optionally inverted so the
 * text ends up dark on light), then nearest-neighbour upscale until the text
 * band is at least `minHeight` pixels tall.
 *
 * Output is a pure function of the frame bytes, the region and the config.
 */
export class ImagePreprocessor {
  constructor(private readonly config: PreprocessConfig) {}

  async prepare(frame: Frame, region: Region): Promise<Result<PreprocessedImage, InvalidRegionError>> {
    if (!regionWithin(region, frame.width, frame.height)) {
      return {
        ok: false,
        error: new InvalidRegionError(
          `Region ${region.width}x${region.height} at (${region.x}, ${region.y}) is outside the ${frame.width}x${frame.height} frame`
        )
      };
    }

    let pipeline = sharp(frame.data, {
      raw: { width: frame.width, height: frame.height, channels: frame.channels }
    })
      .extract({ left: region.x, top: region.y, width: region.width, height: region.height })
      .removeAlpha()
      .greyscale()
      .normalise()
      .threshold(this.config.threshold);

    if (this.config.invert) {
      pipeline = pipeline.negate({ alpha: false });
    }

    const binary = await pipeline.toColourspace('b-w').raw().toBuffer({ resolveWithObject: true });

    const scale = Math.min(this.config.maxScale, Math.max(1, Math.ceil(this.config.minHeight / binary.info.height)));
    if (scale === 1) {
      return {
        ok: true,
        value: {
          width: binary.info.width,
          height: binary.info.height,
          channels: binary.info.channels,
          data: binary.data,
          source: { ...region },
          scale
        }
      };
    }

    // Separate pass: sharp would otherwise resize before thresholding
    const upscaled = await sharp(binary.data, {
      raw: { width: binary.info.width, height: binary.info.height, channels: binary.info.channels }
    })
      .resize(binary.info.width * scale, binary.info.height * scale, { kernel: sharp.kernel.nearest })
      .raw()
      .toBuffer({ resolveWithObject: true });

    return {
      ok: true,
      value: {
        width: upscaled.info.width,
        height: upscaled.info.height,
        channels: upscaled.info.channels,
        data: upscaled.data,
        source: { ...region },
        scale
      }
    };
  }
}

/** PNG encoding for recognizers that only take encoded images. */
export async function encodePng(image: PreprocessedImage): Promise<Buffer> {
  return sharp(image.data, {
    raw: { width: image.width, height: image.height, channels: image.channels }
  })
    .png()
    .toBuffer();
}
