export type StageKind = "extraction" | "scene-detection" | "description" | "grouping";

export type StageState = "pending" | "done" | "failed";

/**
 * A video found during discovery. `name` is the base filename without its
 * extension and is only unique within `directory`.
 */
export interface VideoRef {
  path: string;
  directory: string;
  name: string;
}

export interface StageFailure {
  video: string;
  stage: StageKind;
  message: string;
}
