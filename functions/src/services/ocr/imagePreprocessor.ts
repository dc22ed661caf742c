/**
 * Image Preprocessor
 *
 * Grayscale, upscale, denoise, local contrast and binarization ahead of OCR.
 */

import sharp from 'sharp';

export type ImagePreprocessor = (image: Buffer) => Promise<Buffer>;

export const MIN_OCR_WIDTH = 800;
const MEDIAN_WINDOW = 3;
const CLAHE_TILES = 8;
const CLAHE_MAX_SLOPE = 2;

/**
 * Otsu's threshold: the gray level that maximizes between-class variance.
 * Returns 128 when the image has a single gray level.
 */
export const otsuThreshold = (pixels: Uint8Array): number => {
  const histogram = new Array<number>(256).fill(0);
  for (const value of pixels) {
    histogram[value] += 1;
  }

  const total = pixels.length;
  let sumAll = 0;
  for (let level = 0; level < 256; level++) {
    sumAll += level * histogram[level];
  }

  let threshold = 128;
  let bestVariance = -1;
  let weightBackground = 0;
  let sumBackground = 0;

  for (let level = 0; level < 256; level++) {
    weightBackground += histogram[level];
    if (weightBackground === 0) continue;

    const weightForeground = total - weightBackground;
    if (weightForeground === 0) break;

    sumBackground += level * histogram[level];
    const meanBackground = sumBackground / weightBackground;
    const meanForeground = (sumAll - sumBackground) / weightForeground;
    const variance = weightBackground * weightForeground * (meanBackground - meanForeground) ** 2;

    if (variance > bestVariance) {
      bestVariance = variance;
      threshold = level;
    }
  }

  return threshold;
};

export const preprocessPrescriptionImage: ImagePreprocessor = async (image) => {
  const { width, height } = await sharp(image).metadata();
  if (!width || !height) {
    throw new Error('Image dimensions could not be read');
  }

  const scale = width < MIN_OCR_WIDTH ? MIN_OCR_WIDTH / width : 1;
  const targetWidth = Math.round(width * scale);
  const targetHeight = Math.round(height * scale);

  let pipeline = sharp(image).grayscale();
  if (scale > 1) {
    pipeline = pipeline.resize({ width: targetWidth, height: targetHeight, kernel: 'cubic' });
  }

  const { data, info } = await pipeline
    .median(MEDIAN_WINDOW)
    .clahe({
      width: Math.max(3, Math.ceil(targetWidth / CLAHE_TILES)),
      height: Math.max(3, Math.ceil(targetHeight / CLAHE_TILES)),
      maxSlope: CLAHE_MAX_SLOPE,
    })
    .raw()
    .toBuffer({ resolveWithObject: true });

  // sharp sets pixels >= the threshold to white; Otsu's level belongs to the dark class.
  const level = Math.min(otsuThreshold(data) + 1, 255);

  return sharp(data, { raw: { width: info.width, height: info.height, channels: info.channels } })
    .threshold(level)
    .png()
    .toBuffer();
};
