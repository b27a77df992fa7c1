import type { FrameDescriptionDocument, SceneDocument } from "../artifacts/documents.js";
import type { StageFailure, StageKind, StageState, VideoRef } from "../types.js";

export interface ExtractOptions {
  /** Seconds between sampled frames. */
  interval: number;
}

export interface ExtractionResult {
  framesDir: string;
  frameCount: number;
}

/** Rasterizes a video into `frames/<name>_%04d.png`. */
export interface Extractor {
  extract(video: VideoRef, options: ExtractOptions): Promise<ExtractionResult>;
}

export interface SceneDetectOptions {
  threshold: number;
}

export interface SceneDetector {
  detect(video: VideoRef, options: SceneDetectOptions): Promise<SceneDocument>;
}

export interface FrameInput {
  path: string;
  frameNumber: number;
  timestamp: string;
}

/** Produces one description per frame, keyed by the frame's timestamp. */
export interface Describer {
  describe(video: VideoRef, frames: FrameInput[]): Promise<FrameDescriptionDocument>;
}

export interface Collaborators {
  extractor: Extractor;
  sceneDetector: SceneDetector;
  describer: Describer;
}

export interface StageCounts {
  executed: number;
  skipped: number;
  failed: number;
}

export interface DirectorySummary {
  directory: string;
  /** Null when no video of the directory grouped successfully. */
  folderDocument: string | null;
  succeeded: string[];
  failures: StageFailure[];
  /** Final state of every stage, per video identity. */
  states: Record<string, VideoStageStates>;
}

export interface RunSummary {
  root: string;
  videosFound: number;
  videosSucceeded: number;
  directories: DirectorySummary[];
  stages: Record<StageKind, StageCounts>;
}

export type VideoStageStates = Record<StageKind, StageState>;
