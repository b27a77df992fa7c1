import path from "node:path";
import type { StageKind, StageState, VideoRef } from "../types.js";
import { readJsonArtifact } from "./documents.js";
import {
  descriptionDocumentPath,
  folderDocumentPath,
  framesDir,
  parseFrameFileName,
  sceneDocumentPath,
} from "./paths.js";
import type { ArtifactStore } from "./store.js";

export interface FrameFile {
  path: string;
  frameNumber: number;
}

/** A video's frames under its directory's frames/, in frame order. */
export async function listFrames(store: ArtifactStore, video: VideoRef): Promise<FrameFile[]> {
  const dir = framesDir(video);
  const frames: FrameFile[] = [];

  for (const entry of await store.list(dir)) {
    if (entry.isDirectory) continue;
    const frameNumber = parseFrameFileName(entry.name, video.name);
    if (frameNumber !== null) {
      frames.push({ path: path.join(dir, entry.name), frameNumber });
    }
  }

  return frames.sort((a, b) => a.frameNumber - b.frameNumber);
}

async function isValidJson(store: ArtifactStore, artifactPath: string): Promise<boolean> {
  const read = await readJsonArtifact(store, artifactPath);
  return read.status === "ok";
}

/**
 * Whether a stage's artifact for `video` is already present. JSON artifacts
 * must also parse; a corrupt file counts as absent so it gets regenerated.
 */
export async function stageIsComplete(
  store: ArtifactStore,
  video: VideoRef,
  stage: StageKind,
): Promise<boolean> {
  switch (stage) {
    case "extraction":
      return (await listFrames(store, video)).length > 0;
    case "scene-detection":
      return isValidJson(store, sceneDocumentPath(video));
    case "description":
      return isValidJson(store, descriptionDocumentPath(video));
    case "grouping":
      return isValidJson(store, folderDocumentPath(video.directory));
  }
}

export async function deriveStageState(
  store: ArtifactStore,
  video: VideoRef,
  stage: StageKind,
  options: { force?: boolean } = {},
): Promise<Exclude<StageState, "failed">> {
  if (options.force) return "pending";
  return (await stageIsComplete(store, video, stage)) ? "done" : "pending";
}
