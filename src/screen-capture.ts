import screenshot from 'screenshot-desktop';
import sharp from 'sharp';
import { screen } from '@nut-tree-fork/nut-js';
import { CaptureError } from './errors.js';
import type { Logger } from './logger.js';
import type { Frame, FrameSource, Region, WindowHandle } from './types.js';

/**
 * Grabs the primary display and cuts out the window region. Frames are in
 * logical (pointer) pixels, so on scaled displays the crop is resized back
 * down to the region's size.
 */
export class ScreenCapture implements FrameSource {
  constructor(private readonly logger: Logger) {}

  async capture(handle: WindowHandle, region: Region): Promise<Frame> {
    try {
      const image = await screenshot({ format: 'png' });
      const metadata = await sharp(image).metadata();
      const imageWidth = metadata.width ?? 0;
      const imageHeight = metadata.height ?? 0;
      if (imageWidth === 0 || imageHeight === 0) {
        throw new Error('Screenshot has no dimensions');
      }

      const scale = imageWidth / (await screen.width());
      const { x: left, y: top, width, height } = cropBox(region, scale, imageWidth, imageHeight);

      let pipeline = sharp(image).extract({ left, top, width, height });
      if (scale !== 1) {
        pipeline = pipeline.resize(Math.round(width / scale), Math.round(height / scale));
      }
      const { data, info } = await pipeline.raw().toBuffer({ resolveWithObject: true });

      this.logger.debug('Captured window', {
        window: handle.title,
        size: `${info.width}x${info.height}`,
        displayScale: scale
      });

      return {
        width: info.width,
        height: info.height,
        channels: info.channels,
        data,
        capturedAt: Date.now()
      };
    } catch (error) {
      throw new CaptureError(
        `Failed to capture ${handle.title}: ${error instanceof Error ? error.message : String(error)}`,
        error
      );
    }
  }
}

/**
 * The window region in screenshot pixels. The frame must start at the window
 * origin, since the readout region is measured from it, so a window hanging
 * off the top or left edge is refused. Overhang on the right and bottom is
 * cropped away.
 */
export function cropBox(region: Region, scale: number, imageWidth: number, imageHeight: number): Region {
  const left = Math.round(region.x * scale);
  const top = Math.round(region.y * scale);
  if (left < 0 || top < 0) {
    throw new Error(`Window region ${JSON.stringify(region)} starts off screen`);
  }

  const width = Math.min(Math.round(region.width * scale), imageWidth - left);
  const height = Math.min(Math.round(region.height * scale), imageHeight - top);
  if (width <= 0 || height <= 0) {
    throw new Error(`Window region ${JSON.stringify(region)} is off screen`);
  }
  return { x: left, y: top, width, height };
}
