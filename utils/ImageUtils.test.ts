/**
 * Tests for image decoding and tensor normalization
 */

import { ImageUtils } from './ImageUtils.js';
import { ImageDecodeError, type ImageInstance } from '../types/index.js';
import { colourPngBase64, createMockLogger, greyscalePngBase64, normalizePixel } from '../test-utils/fixtures.js';

describe('ImageUtils', () => {
  describe('decodeBase64Image', () => {
    it('should decode raw base64', () => {
      expect(ImageUtils.decodeBase64Image('aGVsbG8=').toString('utf8')).toBe('hello');
    });

    it('should strip a data URL prefix', () => {
      expect(ImageUtils.decodeBase64Image('data:image/png;base64,aGVsbG8=').toString('utf8')).toBe('hello');
    });

    it('should ignore line breaks inside the payload', () => {
      expect(ImageUtils.decodeBase64Image('aGVs\nbG8=').toString('utf8')).toBe('hello');
    });

    it('should reject malformed base64', () => {
      expect(() => ImageUtils.decodeBase64Image('not-base64!!')).toThrow(ImageDecodeError);
      expect(() => ImageUtils.decodeBase64Image('not-base64!!')).toThrow('Image data is not valid base64');
    });

    it('should reject base64 with a truncated length', () => {
      expect(() => ImageUtils.decodeBase64Image('aGVsbG8')).toThrow('Image data is not valid base64');
    });

    it('should reject an empty payload', () => {
      expect(() => ImageUtils.decodeBase64Image('')).toThrow('Image data is empty');
    });

    it('should reject a data URL that is not base64 encoded', () => {
      expect(() => ImageUtils.decodeBase64Image('data:image/png,aGVsbG8=')).toThrow('Invalid data URL format');
    });

    it('should tag decode failures with INVALID_BASE64', () => {
      try {
        ImageUtils.decodeBase64Image('not-base64!!');
        throw new Error('expected decodeBase64Image to throw');
      } catch (error) {
        expect(error).toBeInstanceOf(ImageDecodeError);
        expect(error).toMatchObject({ code: 'INVALID_BASE64' });
      }
    });
  });

  describe('imageToTensor', () => {
    it('should scale and normalize every pixel into a [1][height][width] tensor', async () => {
      const png = ImageUtils.decodeBase64Image(await greyscalePngBase64([0, 255, 128, 64], 2, 2));

      const { tensor, width, height } = await ImageUtils.imageToTensor(png);

      expect(width).toBe(2);
      expect(height).toBe(2);
      expect(tensor).toHaveLength(1);
      expect(tensor[0]).toHaveLength(2);
      expect(tensor[0][0][0]).toBeCloseTo(normalizePixel(0), 10);
      expect(tensor[0][0][1]).toBeCloseTo(normalizePixel(255), 10);
      expect(tensor[0][1][0]).toBeCloseTo(normalizePixel(128), 10);
      expect(tensor[0][1][1]).toBeCloseTo(normalizePixel(64), 10);
    });

    it('should map a black pixel to -0.1307 / 0.3081', async () => {
      const png = ImageUtils.decodeBase64Image(await greyscalePngBase64([0], 1, 1));

      const { tensor } = await ImageUtils.imageToTensor(png);

      expect(tensor[0][0][0]).toBeCloseTo(-0.424212917883804, 10);
    });

    it('should keep rows of a non-square image in order', async () => {
      const png = ImageUtils.decodeBase64Image(await greyscalePngBase64([10, 20, 30, 40, 50, 60], 3, 2));

      const { tensor, width, height } = await ImageUtils.imageToTensor(png);

      expect(width).toBe(3);
      expect(height).toBe(2);
      expect(tensor[0].map(row => row.length)).toEqual([3, 3]);
      expect(tensor[0][1][2]).toBeCloseTo(normalizePixel(60), 10);
    });

    it('should produce identical output for the same image', async () => {
      const png = ImageUtils.decodeBase64Image(await greyscalePngBase64([1, 2, 3, 4, 5, 6, 7, 8, 9], 3, 3));

      const first = await ImageUtils.imageToTensor(png);
      const second = await ImageUtils.imageToTensor(png);

      expect(second.tensor).toEqual(first.tensor);
    });

    it('should reduce an RGB image to a single channel', async () => {
      const png = ImageUtils.decodeBase64Image(
        await colourPngBase64([0, 0, 0, 255, 255, 255, 128, 64, 200], 3, 1, 3)
      );

      const { tensor, width, height } = await ImageUtils.imageToTensor(png);

      expect(width).toBe(3);
      expect(height).toBe(1);
      expect(tensor).toHaveLength(1);
      expect(tensor[0]).toHaveLength(1);
      expect(tensor[0][0]).toHaveLength(3);
      expect(tensor[0][0][0]).toBeCloseTo(normalizePixel(0), 1);
      expect(tensor[0][0][1]).toBeCloseTo(normalizePixel(255), 1);
      expect(tensor[0][0][2]).toBeGreaterThan(normalizePixel(0));
      expect(tensor[0][0][2]).toBeLessThan(normalizePixel(255));
    });

    it('should drop the alpha channel of an RGBA image', async () => {
      const png = ImageUtils.decodeBase64Image(
        await colourPngBase64([255, 255, 255, 0, 0, 0, 0, 255, 255, 255, 255, 128, 0, 0, 0, 0], 2, 2, 4)
      );

      const { tensor, width, height } = await ImageUtils.imageToTensor(png);

      expect(width).toBe(2);
      expect(height).toBe(2);
      expect(tensor).toHaveLength(1);
      expect(tensor[0].map(row => row.length)).toEqual([2, 2]);
      expect(tensor[0][0][0]).toBeCloseTo(normalizePixel(255), 1);
      expect(tensor[0][0][1]).toBeCloseTo(normalizePixel(0), 1);
      expect(tensor[0][1][0]).toBeCloseTo(normalizePixel(255), 1);
      expect(tensor[0][1][1]).toBeCloseTo(normalizePixel(0), 1);
    });

    it('should reject bytes that are not an image', async () => {
      await expect(ImageUtils.imageToTensor(Buffer.from('definitely not an image'))).rejects.toMatchObject({
        name: 'ImageDecodeError',
        code: 'UNSUPPORTED_IMAGE'
      });
    });
  });

  describe('transformInstance', () => {
    it('should replace data with the tensor and keep other fields', async () => {
      const logger = createMockLogger();
      const instance: ImageInstance = { data: await greyscalePngBase64([255], 1, 1), key: 'digit-7' };

      const transformed = await ImageUtils.transformInstance(instance, logger);

      expect(transformed.key).toBe('digit-7');
      expect(transformed.data).toHaveLength(1);
      expect(transformed.data[0][0][0]).toBeCloseTo(normalizePixel(255), 10);
      expect(typeof instance.data).toBe('string');
    });

    it('should log a summary at info and the full instance at debug', async () => {
      const logger = createMockLogger();
      const instance: ImageInstance = { data: await greyscalePngBase64([0, 0], 2, 1) };

      const transformed = await ImageUtils.transformInstance(instance, logger);

      expect(logger.info).toHaveBeenCalledWith('Decoded image instance 2x1');
      expect(logger.debug).toHaveBeenCalledWith('Transformed instance', transformed);
    });

    it('should fail on malformed base64 without producing output', async () => {
      const logger = createMockLogger();

      await expect(ImageUtils.transformInstance({ data: 'not-base64!!' }, logger)).rejects.toBeInstanceOf(
        ImageDecodeError
      );
      expect(logger.info).not.toHaveBeenCalled();
    });
  });
});
