import fs from 'fs';
import path from 'path';
import { PNG } from 'pngjs';
import { AutomationError, ProtocolError, Screenshot, ScreenshotResponse } from '../types';

const MAX_5BIT = 0x1f;

function scale5(value: number): number {
  return Math.round((value * 255) / MAX_5BIT);
}

const SUPPORTED_DEPTHS: readonly number[] = [1, 8, 16, 32];

function unsupportedDepth(depth: number): AutomationError {
  return new AutomationError(
    'UNSUPPORTED_DEPTH',
    `Cannot convert ${depth}-bit screenshots`,
    { depth },
    'Switch the guest display to 1, 8, 16 or 32 bits or save the raw framebuffer'
  );
}

// Expand the emulator framebuffer (big-endian, row stride may include padding) to RGBA.
export function screenshotToRgba(shot: Screenshot): Buffer {
  const { width, height, depth, stride, pixels } = shot;
  if (!SUPPORTED_DEPTHS.includes(depth)) {
    throw unsupportedDepth(depth);
  }
  const rowBytes = Math.ceil((width * depth) / 8);
  if (stride < rowBytes) {
    throw new ProtocolError(
      `Screenshot stride too short: ${stride} bytes per row for ${width} pixels at ${depth} bits`
    );
  }
  if (pixels.length < stride * height) {
    throw new ProtocolError(
      `Screenshot buffer too short: ${pixels.length} bytes for ${height} rows of ${stride}`
    );
  }

  const rgba = Buffer.alloc(width * height * 4);
  for (let y = 0; y < height; y++) {
    const row = y * stride;
    for (let x = 0; x < width; x++) {
      const out = (y * width + x) * 4;
      let r: number;
      let g: number;
      let b: number;

      switch (depth) {
        case 1: {
          // Set bits are black on classic Mac monochrome displays.
          const bit = (pixels[row + (x >> 3)] >> (7 - (x & 7))) & 1;
          r = g = b = bit ? 0 : 255;
          break;
        }
        case 8: {
          // No colour table is sent; the default palette runs white (0) to black (255).
          r = g = b = 255 - pixels[row + x];
          break;
        }
        case 16: {
          const value = pixels.readUInt16BE(row + x * 2);
          r = scale5((value >> 10) & MAX_5BIT);
          g = scale5((value >> 5) & MAX_5BIT);
          b = scale5(value & MAX_5BIT);
          break;
        }
        case 32: {
          const offset = row + x * 4;
          r = pixels[offset + 1];
          g = pixels[offset + 2];
          b = pixels[offset + 3];
          break;
        }
        default:
          throw unsupportedDepth(depth);
      }

      rgba[out] = r;
      rgba[out + 1] = g;
      rgba[out + 2] = b;
      rgba[out + 3] = 0xff;
    }
  }

  return rgba;
}

export function encodeScreenshotPng(shot: Screenshot): Buffer {
  const png = new PNG({ width: shot.width, height: shot.height });
  png.data = screenshotToRgba(shot);
  return PNG.sync.write(png);
}

// Convert binary data to base64
export function binaryToBase64(data: Buffer): string {
  return data.toString('base64');
}

// Writes the framebuffer as-is, e.g. for screenshots taken between test targets.
export async function saveRawScreenshot(shot: Screenshot, directory: string, name: string): Promise<string> {
  const screenshotPath = path.join(directory, `${name}.raw`);
  await fs.promises.writeFile(screenshotPath, shot.pixels);
  return screenshotPath;
}

export function toScreenshotResponse(shot: Screenshot): ScreenshotResponse {
  try {
    return {
      data: binaryToBase64(encodeScreenshotPng(shot)),
      format: 'png',
      width: shot.width,
      height: shot.height,
      depth: shot.depth,
      timestamp: Date.now(),
    };
  } catch (error) {
    if (error instanceof AutomationError) {
      throw error;
    }
    throw new Error(
      `Failed to encode screenshot: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}
