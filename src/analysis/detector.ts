import type { DetectedObject } from '../types.js';
import type { Frame } from '../video/utils.js';

/** Objects found in one frame; `frameIndex` is filled in by the caller. */
export type FrameDetections = Omit<DetectedObject, 'frameIndex'>[];

export interface ObjectDetector {
  readonly name: string;
  /** 1 when the backend cannot take more than one frame per call. */
  readonly maxBatchSize: number;
  available(): boolean;
  detect(frames: Frame[]): Promise<FrameDetections[]>;
}

export class UnavailableDetector implements ObjectDetector {
  readonly name = 'unavailable';
  readonly maxBatchSize = 1;

  constructor(readonly reason = 'No object detector configured') {}

  available() {
    return false;
  }

  async detect(frames: Frame[]): Promise<FrameDetections[]> {
    return frames.map(() => []);
  }
}
