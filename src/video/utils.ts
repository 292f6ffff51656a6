import { PNG } from 'pngjs';
import { SentinelError } from '../errors.js';

export type FrameChannels = 1 | 3 | 4;

export type Frame = {
  width: number;
  height: number;
  channels: FrameChannels;
  data: Uint8Array;
};

export function decodePng(buffer: Buffer): Frame {
  let image: PNG;
  try {
    image = PNG.sync.read(buffer);
  } catch (error) {
    throw new SentinelError('InvalidSnapshot', 'Image could not be decoded', { cause: error });
  }
  return { width: image.width, height: image.height, channels: 4, data: new Uint8Array(image.data) };
}

export function encodePng(frame: Frame): Buffer {
  const png = new PNG({ width: frame.width, height: frame.height });
  const pixels = frame.width * frame.height;
  for (let i = 0; i < pixels; i += 1) {
    const [r, g, b, a] = readPixel(frame, i);
    const offset = i * 4;
    png.data[offset] = r;
    png.data[offset + 1] = g;
    png.data[offset + 2] = b;
    png.data[offset + 3] = a;
  }
  return PNG.sync.write(png);
}

export function createFrame(width: number, height: number, channels: FrameChannels = 1): Frame {
  return { width, height, channels, data: new Uint8Array(width * height * channels) };
}

// Rec. 709 luma coefficients
export function luma(r: number, g: number, b: number) {
  return 0.2126 * r + 0.7152 * g + 0.0722 * b;
}

export function readPixel(frame: Frame, index: number): [number, number, number, number] {
  const offset = index * frame.channels;
  if (frame.channels === 1) {
    const value = frame.data[offset];
    return [value, value, value, 255];
  }
  const alpha = frame.channels === 4 ? frame.data[offset + 3] : 255;
  return [frame.data[offset], frame.data[offset + 1], frame.data[offset + 2], alpha];
}

/**
 * Area-average resample into planar (CHW) floats scaled to [0, 1]. Upscaling
 * degrades to nearest-neighbour sampling.
 */
export function frameToPlanar(frame: Frame, width: number, height: number, channels: 1 | 3): Float32Array {
  if (frame.width <= 0 || frame.height <= 0) {
    throw new SentinelError('InvalidSnapshot', 'Frame has no pixels');
  }
  const plane = width * height;
  const output = new Float32Array(plane * channels);
  const scaleX = frame.width / width;
  const scaleY = frame.height / height;

  for (let oy = 0; oy < height; oy += 1) {
    const y0 = Math.floor(oy * scaleY);
    const y1 = Math.max(y0 + 1, Math.floor((oy + 1) * scaleY));
    for (let ox = 0; ox < width; ox += 1) {
      const x0 = Math.floor(ox * scaleX);
      const x1 = Math.max(x0 + 1, Math.floor((ox + 1) * scaleX));
      let r = 0;
      let g = 0;
      let b = 0;
      let count = 0;
      for (let sy = y0; sy < Math.min(y1, frame.height); sy += 1) {
        for (let sx = x0; sx < Math.min(x1, frame.width); sx += 1) {
          const [pr, pg, pb] = readPixel(frame, sy * frame.width + sx);
          r += pr;
          g += pg;
          b += pb;
          count += 1;
        }
      }
      const target = oy * width + ox;
      const divisor = Math.max(1, count) * 255;
      if (channels === 1) {
        output[target] = luma(r, g, b) / divisor;
      } else {
        output[target] = r / divisor;
        output[plane + target] = g / divisor;
        output[2 * plane + target] = b / divisor;
      }
    }
  }

  return output;
}

export function clamp(value: number, min: number, max: number) {
  return Math.min(max, Math.max(min, value));
}
