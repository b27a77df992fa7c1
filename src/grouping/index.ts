import { ConfigurationError, GroupingInputError } from "../errors.js";
import {
  frameDescriptionDocumentSchema,
  readDocument,
  sceneDocumentSchema,
  type FrameDescriptionDocument,
  type GroupedRun,
  type SceneDocument,
  type ScenesInfo,
  type VideoResult,
} from "../artifacts/documents.js";
import { descriptionDocumentPath, sceneDocumentPath } from "../artifacts/paths.js";
import type { ArtifactStore } from "../artifacts/store.js";
import type { VideoRef } from "../types.js";
import { createChildLogger } from "../utils/logger.js";
import { normalizeDescription, similarityRatio } from "./similarity.js";

export { normalizeDescription, similarityRatio, matchingBlocks } from "./similarity.js";

const log = createChildLogger({ module: "grouping" });

export const DEFAULT_GROUPING_THRESHOLD = 0.8;

interface OpenRun {
  startTime: string;
  endTime: string;
  anchor: string;
  description: string;
}

function closeRun(run: OpenRun): GroupedRun {
  return {
    start_time: run.startTime,
    end_time: run.endTime,
    description: run.description,
  };
}

/**
 * Collapse consecutive similar frame descriptions into runs.
 *
 * Each frame is compared with the first frame of the current run, not with
 * the frame before it, so a run cannot drift away from its anchor one small
 * step at a time. A frame joins the run when the ratio is at least
 * `threshold`; the run is reported with the anchor's original text.
 */
export function groupDescriptions(
  descriptions: FrameDescriptionDocument,
  threshold: number = DEFAULT_GROUPING_THRESHOLD,
): GroupedRun[] {
  if (!(threshold >= 0 && threshold <= 1)) {
    throw new ConfigurationError(`Grouping threshold must be between 0.0 and 1.0 (got ${threshold})`);
  }

  // fixed-width timestamps: lexicographic order is chronological
  const timestamps = Object.keys(descriptions).sort((x, y) => (x < y ? -1 : x > y ? 1 : 0));
  if (timestamps.length === 0) return [];

  const runs: GroupedRun[] = [];
  const first = timestamps[0];
  let current: OpenRun = {
    startTime: first,
    endTime: first,
    anchor: normalizeDescription(descriptions[first]),
    description: descriptions[first],
  };

  for (const ts of timestamps.slice(1)) {
    const text = descriptions[ts];
    const normalized = normalizeDescription(text);

    if (similarityRatio(current.anchor, normalized) >= threshold) {
      current.endTime = ts;
      continue;
    }

    runs.push(closeRun(current));
    current = { startTime: ts, endTime: ts, anchor: normalized, description: text };
  }

  runs.push(closeRun(current));
  return runs;
}

export function toScenesInfo(scenes: SceneDocument | null): ScenesInfo | null {
  if (!scenes) return null;
  return {
    scene_threshold: scenes.scene_threshold,
    total_scenes: scenes.total_scenes,
    scenes: scenes.scenes,
  };
}

/**
 * Merge one video's descriptions and scenes. Scene boundaries are reported
 * as-is next to the runs; the two are not intersected.
 */
export function buildVideoResult(
  descriptions: FrameDescriptionDocument,
  scenes: SceneDocument | null,
  threshold: number = DEFAULT_GROUPING_THRESHOLD,
): VideoResult {
  return {
    timestamps: groupDescriptions(descriptions, threshold),
    "scenes-info": toScenesInfo(scenes),
  };
}

/**
 * Load a video's description and scene documents from the store and group
 * them. A missing or malformed description document is a
 * GroupingInputError; a missing or malformed scene document only drops
 * `scenes-info`.
 */
export async function groupVideo(
  store: ArtifactStore,
  video: VideoRef,
  threshold: number = DEFAULT_GROUPING_THRESHOLD,
): Promise<VideoResult> {
  const descriptionPath = descriptionDocumentPath(video);
  const descriptions = await readDocument(store, descriptionPath, frameDescriptionDocumentSchema);

  if (descriptions.status === "missing") {
    throw new GroupingInputError(video.name, `Description document not found: ${descriptionPath}`);
  }
  if (descriptions.status === "invalid") {
    throw new GroupingInputError(video.name, descriptions.error.message, { cause: descriptions.error });
  }

  const scenePath = sceneDocumentPath(video);
  const scenes = await readDocument(store, scenePath, sceneDocumentSchema);
  if (scenes.status === "missing") {
    log.debug("No scene document, grouping without scenes", { video: video.name, path: scenePath });
  } else if (scenes.status === "invalid") {
    log.warn("Ignoring unreadable scene document", { video: video.name, error: scenes.error.message });
  }

  const result = buildVideoResult(
    descriptions.value,
    scenes.status === "ok" ? scenes.value : null,
    threshold,
  );

  log.debug(`Grouped ${Object.keys(descriptions.value).length} frames into ${result.timestamps.length} runs`, {
    video: video.name,
  });
  return result;
}
