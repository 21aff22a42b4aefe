import sharp from 'sharp';
import type { Logger } from '../utils/LoggerUtils.js';

/**
 * Encodes greyscale pixel values (row-major) as a base64 PNG
 */
export async function greyscalePngBase64(pixels: number[], width: number, height: number): Promise<string> {
  const png = await sharp(Buffer.from(pixels), { raw: { width, height, channels: 1 } })
    .png()
    .toBuffer();
  return png.toString('base64');
}

/**
 * Encodes interleaved colour pixel values (RGB or RGBA, row-major) as a base64 PNG
 */
export async function colourPngBase64(
  pixels: number[],
  width: number,
  height: number,
  channels: 3 | 4
): Promise<string> {
  const png = await sharp(Buffer.from(pixels), { raw: { width, height, channels } })
    .png()
    .toBuffer();
  return png.toString('base64');
}

export const normalizePixel = (value: number): number => (value / 255 - 0.1307) / 0.3081;

export interface MockLogger extends Logger {
  debug: jest.Mock;
  info: jest.Mock;
  warn: jest.Mock;
  error: jest.Mock;
  child: jest.Mock;
}

export function createMockLogger(): MockLogger {
  const logger: MockLogger = {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    child: jest.fn(() => logger)
  };
  return logger;
}
