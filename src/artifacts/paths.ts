import path from "node:path";
import type { VideoRef } from "../types.js";

export const FRAMES_DIR_NAME = "frames";
export const SCENE_SUFFIX = ".scene.json";
export const DESCRIPTION_SUFFIX = ".description.json";
export const FOLDER_SUFFIX = ".descriptions.json";
export const FRAME_MANIFEST_SUFFIX = ".frames.json";

export const VIDEO_EXTENSIONS = new Set([
  ".mp4", ".avi", ".mov", ".mkv", ".webm", ".flv", ".m4v", ".wmv",
]);

export function isVideoFile(fileName: string): boolean {
  return VIDEO_EXTENSIONS.has(path.extname(fileName).toLowerCase());
}

export function toVideoRef(videoPath: string): VideoRef {
  return {
    path: videoPath,
    directory: path.dirname(videoPath),
    name: path.basename(videoPath, path.extname(videoPath)),
  };
}

export function framesDir(video: VideoRef): string {
  return path.join(video.directory, FRAMES_DIR_NAME);
}

/** ffmpeg output pattern: frames/<name>_%04d.png */
export function framePattern(video: VideoRef): string {
  return path.join(framesDir(video), `${video.name}_%04d.png`);
}

/** Sampling record kept with the frames, so it goes when they are cleaned. */
export function frameManifestPath(video: VideoRef): string {
  return path.join(framesDir(video), `${video.name}${FRAME_MANIFEST_SUFFIX}`);
}

export function sceneDocumentPath(video: VideoRef): string {
  return path.join(video.directory, `${video.name}${SCENE_SUFFIX}`);
}

export function descriptionDocumentPath(video: VideoRef): string {
  return path.join(video.directory, `${video.name}${DESCRIPTION_SUFFIX}`);
}

export function folderDocumentPath(directory: string): string {
  return path.join(directory, `${path.basename(directory)}${FOLDER_SUFFIX}`);
}

/**
 * Frame number of `<name>_0001.png` style files that belong to `videoName`,
 * or null for anything else (including other videos' frames that share the
 * directory).
 */
export function parseFrameFileName(fileName: string, videoName: string): number | null {
  if (path.extname(fileName).toLowerCase() !== ".png") return null;

  const stem = path.basename(fileName, path.extname(fileName));
  const separator = stem.lastIndexOf("_");
  if (separator === -1 || stem.slice(0, separator) !== videoName) return null;

  const digits = stem.slice(separator + 1);
  if (!/^\d+$/.test(digits)) return null;
  return parseInt(digits, 10);
}
