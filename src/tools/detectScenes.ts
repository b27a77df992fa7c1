import { CollaboratorError, errorMessage } from "../errors.js";
import type { SceneChange, SceneDocument, SceneRecord } from "../artifacts/documents.js";
import type { SceneDetectOptions, SceneDetector } from "../pipeline/types.js";
import type { VideoRef } from "../types.js";
import { createChildLogger } from "../utils/logger.js";
import { formatTimestamp, roundSeconds } from "../utils/timestamps.js";
import { probeVideo, runFfmpeg, type FfmpegOptions } from "./ffmpeg.js";

const log = createChildLogger({ module: "scenes" });

export const DEFAULT_SCENE_THRESHOLD = 0.4;

const FRAME_LINE = /frame:\s*\d+\s+pts:\s*-?\d+\s+pts_time:\s*(-?[\d.]+)/;
const SCORE_LINE = /lavfi\.scene_score=([\d.]+)/;

/**
 * Parse the report of `select='gt(scene,T)',metadata=print`: a
 * `frame:N pts:P pts_time:S` line per selected frame followed by its
 * `lavfi.scene_score=X` line. Frame numbers are derived from pts_time and
 * the stream's frame rate, since the filter numbers only selected frames.
 */
export function parseSceneReport(stderr: string, fps: number): SceneChange[] {
  const changes: SceneChange[] = [];
  let pending: SceneChange | null = null;

  for (const line of stderr.split("\n")) {
    const frame = FRAME_LINE.exec(line);
    if (frame) {
      if (pending) changes.push(pending);
      const seconds = roundSeconds(Math.max(0, Number(frame[1])));
      pending = {
        frame_number: Math.round(seconds * fps),
        timestamp: formatTimestamp(seconds),
        seconds,
        scene_score: 0,
      };
      continue;
    }

    const score = SCORE_LINE.exec(line);
    if (score && pending) {
      pending.scene_score = roundSeconds(Number(score[1]));
      changes.push(pending);
      pending = null;
    }
  }
  if (pending) changes.push(pending);

  return changes.sort((a, b) => a.seconds - b.seconds);
}

/**
 * Turn change points into contiguous scenes covering [0, duration]. Scene 1
 * starts at zero; every later scene starts at the change that opened it.
 */
export function buildScenes(changes: SceneChange[], durationSeconds: number): SceneRecord[] {
  const duration = roundSeconds(durationSeconds);
  const cuts = changes.filter((c) => c.seconds > 0 && c.seconds < duration);

  const starts = [0, ...cuts.map((c) => c.seconds)];
  const ends = [...cuts.map((c) => c.seconds), duration];

  return starts.map((start, i) => ({
    scene_number: i + 1,
    start_time: formatTimestamp(start),
    end_time: formatTimestamp(ends[i]),
    duration_seconds: roundSeconds(ends[i] - start),
    scene_changes: i === 0 ? [] : [cuts[i - 1]],
  }));
}

export class FfmpegSceneDetector implements SceneDetector {
  constructor(private readonly ffmpeg: FfmpegOptions) {}

  async detect(video: VideoRef, options: SceneDetectOptions): Promise<SceneDocument> {
    try {
      const probe = await probeVideo(video.path, this.ffmpeg);
      log.debug(`Video duration: ${formatTimestamp(probe.durationSeconds)}`, { video: video.name });

      const stderr = await runFfmpeg([
        "-hide_banner",
        "-i", video.path,
        "-filter:v", `select='gt(scene,${options.threshold})',metadata=print`,
        "-an",
        "-f", "null",
        "-",
      ], this.ffmpeg);

      const changes = parseSceneReport(stderr, probe.fps);
      const scenes = buildScenes(changes, probe.durationSeconds);
      log.info(`Detected ${changes.length} scene changes, ${scenes.length} scenes`, { video: video.name });

      return {
        video_file: video.path,
        scene_threshold: options.threshold,
        total_scenes: scenes.length,
        scenes,
      };
    } catch (err) {
      throw new CollaboratorError("scene-detection", video.name, `Scene detection failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }
}
