import type { Frame } from '../video/utils.js';

export type BufferedFrame = {
  frame: Frame;
  ts: number;
};

export class ClipBuffer {
  private readonly frames: BufferedFrame[] = [];

  constructor(private readonly capacity: number) {}

  push(entry: BufferedFrame) {
    if (this.capacity <= 0) {
      return;
    }
    this.frames.push(entry);
    if (this.frames.length > this.capacity) {
      this.frames.shift();
    }
  }

  snapshot(): BufferedFrame[] {
    return [...this.frames];
  }
}
