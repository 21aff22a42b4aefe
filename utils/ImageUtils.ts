import sharp from 'sharp';
import { TENSOR_NORMALIZATION } from '../config/transformer.js';
import {
  ImageDecodeError,
  type ImageInstance,
  type Tensor,
  type TensorInstance
} from '../types/index.js';
import type { Logger } from './LoggerUtils.js';

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * ImageUtils - decoding of base64 image payloads into normalized tensors
 */
export class ImageUtils {

  /**
   * Decodes a base64 payload (raw or data URL) into the image bytes.
   * Only canonical base64 is accepted; anything else is rejected instead of
   * being decoded leniently.
   */
  static decodeBase64Image(imageData: string): Buffer {
    let base64Data = imageData;
    if (imageData.startsWith('data:')) {
      const separator = imageData.indexOf(',');
      if (separator === -1 || !imageData.slice(0, separator).endsWith(';base64')) {
        throw new ImageDecodeError('Invalid data URL format', 'INVALID_BASE64');
      }
      base64Data = imageData.slice(separator + 1);
    }

    const compact = base64Data.replace(/\s+/g, '');
    if (compact.length === 0) {
      throw new ImageDecodeError('Image data is empty', 'INVALID_BASE64');
    }
    if (compact.length % 4 !== 0 || !BASE64_PATTERN.test(compact)) {
      throw new ImageDecodeError('Image data is not valid base64', 'INVALID_BASE64');
    }

    return Buffer.from(compact, 'base64');
  }

  /**
   * Converts image bytes into a single-channel tensor: pixels are scaled to
   * [0, 1] and shifted by the configured mean and standard deviation.
   * @returns Tensor shaped [1][height][width]
   */
  static async imageToTensor(imageBuffer: Buffer): Promise<{ tensor: Tensor; width: number; height: number }> {
    let pixels: Buffer;
    let info: sharp.OutputInfo;
    try {
      ({ data: pixels, info } = await sharp(imageBuffer)
        .removeAlpha()
        .greyscale()
        .toColourspace('b-w')
        .raw()
        .toBuffer({ resolveWithObject: true }));
    } catch (error) {
      throw new ImageDecodeError(
        `Unable to decode image: ${error instanceof Error ? error.message : 'Unknown error'}`,
        'UNSUPPORTED_IMAGE'
      );
    }

    const { width, height, channels } = info;
    const { mean, std } = TENSOR_NORMALIZATION;
    const rows: number[][] = [];

    for (let y = 0; y < height; y++) {
      const row: number[] = new Array(width);
      for (let x = 0; x < width; x++) {
        const value = pixels[(y * width + x) * channels] / 255;
        row[x] = (value - mean) / std;
      }
      rows.push(row);
    }

    return { tensor: [rows], width, height };
  }

  /**
   * Replaces the base64 `data` of an instance with its normalized tensor.
   * Returns a new instance; other fields are carried over as they are.
   */
  static async transformInstance(instance: ImageInstance, logger: Logger): Promise<TensorInstance> {
    const imageBuffer = this.decodeBase64Image(instance.data);
    const { tensor, width, height } = await this.imageToTensor(imageBuffer);
    const transformed: TensorInstance = { ...instance, data: tensor };

    logger.info(`Decoded image instance ${width}x${height}`);
    logger.debug('Transformed instance', transformed);
    return transformed;
  }
}
