import sharp from 'sharp';
import { DecodedScreenshot } from '../types';

// Get image dimensions from PNG data
export function getPNGDimensions(pngData: Buffer): { width: number; height: number } {
  // PNG signature: 89 50 4E 47 0D 0A 1A 0A
  if (pngData.length < 24 || pngData.toString('hex', 0, 8) !== '89504e470d0a1a0a') {
    throw new Error('Invalid PNG data');
  }

  // IHDR is the first chunk; width and height are big-endian at bytes 16-19 and 20-23
  const width = pngData.readUInt32BE(16);
  const height = pngData.readUInt32BE(20);

  return { width, height };
}

// Convert binary data to base64
export function binaryToBase64(data: Buffer): string {
  return data.toString('base64');
}

// Decode a pulled screencap file into raw pixels, keeping the PNG alongside
export async function decodeScreenshot(png: Buffer): Promise<DecodedScreenshot> {
  getPNGDimensions(png);

  const { data, info } = await sharp(png).raw().toBuffer({ resolveWithObject: true });

  return {
    png,
    pixels: data,
    width: info.width,
    height: info.height,
    channels: info.channels,
  };
}
