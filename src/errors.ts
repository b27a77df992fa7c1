import type { StageKind } from "./types.js";

export type PipelineErrorCode =
  | "CONFIGURATION"
  | "COLLABORATOR"
  | "ARTIFACT_PARSE"
  | "GROUPING_INPUT";

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PipelineError";
    this.code = code;
  }
}

/** Bad arguments, invalid environment or a missing root directory. Fatal before any work. */
export class ConfigurationError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIGURATION", message, options);
    this.name = "ConfigurationError";
  }
}

/**
 * An external tool (ffmpeg, ffprobe, the vision model) failed or returned
 * output that could not be used for one video.
 */
export class CollaboratorError extends PipelineError {
  readonly stage: StageKind;
  readonly video: string;

  constructor(stage: StageKind, video: string, message: string, options?: { cause?: unknown }) {
    super("COLLABORATOR", message, options);
    this.name = "CollaboratorError";
    this.stage = stage;
    this.video = video;
  }
}

/** An artifact exists on disk but is not valid JSON, or does not match its schema. */
export class ArtifactParseError extends PipelineError {
  readonly artifactPath: string;

  constructor(artifactPath: string, message: string, options?: { cause?: unknown }) {
    super("ARTIFACT_PARSE", message, options);
    this.name = "ArtifactParseError";
    this.artifactPath = artifactPath;
  }
}

export class GroupingInputError extends PipelineError {
  readonly video: string;

  constructor(video: string, message: string, options?: { cause?: unknown }) {
    super("GROUPING_INPUT", message, options);
    this.name = "GroupingInputError";
    this.video = video;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
