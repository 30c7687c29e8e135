import { AudioFormat, AudioFrame } from '../../types';

export interface FrameStreamOptions extends AudioFormat {
  onFrame: (frame: AudioFrame) => void;
  /** Capture failed after start; no further frames will arrive. */
  onError?: (error: Error) => void;
}

export interface AudioSource {
  isCapturing(): boolean;
  start(options: FrameStreamOptions): Promise<void>;
  stop(): Promise<void>;
}
