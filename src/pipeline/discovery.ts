import path from "node:path";
import { FRAMES_DIR_NAME, isVideoFile, toVideoRef } from "../artifacts/paths.js";
import type { ArtifactStore } from "../artifacts/store.js";
import type { VideoRef } from "../types.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "discovery" });

const byName = (a: { name: string }, b: { name: string }) =>
  a.name < b.name ? -1 : a.name > b.name ? 1 : 0;

/**
 * Find videos under `root` in lexicographic path order, never descending
 * into a frames/ directory. Two videos in one directory that share a base
 * name (clip.mp4, clip.mov) would share artifacts, so only the first is
 * kept.
 */
export async function discoverVideos(store: ArtifactStore, root: string): Promise<VideoRef[]> {
  const videos: VideoRef[] = [];

  async function walk(dir: string): Promise<void> {
    const entries = [...(await store.list(dir))].sort(byName);
    const seen = new Set<string>();

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);

      if (entry.isDirectory) {
        if (entry.name !== FRAMES_DIR_NAME) await walk(fullPath);
        continue;
      }
      if (!isVideoFile(entry.name)) continue;

      const video = toVideoRef(fullPath);
      if (seen.has(video.name)) {
        log.warn(`Skipping ${fullPath}: another video in ${dir} is already named "${video.name}"`);
        continue;
      }
      seen.add(video.name);
      videos.push(video);
    }
  }

  await walk(root);
  return videos;
}

/** Videos keyed by directory, directories in lexicographic order. */
export function groupByDirectory(videos: VideoRef[]): Map<string, VideoRef[]> {
  const directories = new Map<string, VideoRef[]>();
  const sorted = [...videos].sort((a, b) =>
    a.directory < b.directory ? -1 : a.directory > b.directory ? 1 : byName(a, b),
  );

  for (const video of sorted) {
    const list = directories.get(video.directory);
    if (list) list.push(video);
    else directories.set(video.directory, [video]);
  }
  return directories;
}
