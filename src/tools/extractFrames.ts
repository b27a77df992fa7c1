import path from "node:path";
import { mkdir, readdir, unlink } from "node:fs/promises";
import { CollaboratorError, errorMessage } from "../errors.js";
import { framePattern, framesDir, parseFrameFileName } from "../artifacts/paths.js";
import type { ExtractOptions, ExtractionResult, Extractor } from "../pipeline/types.js";
import type { VideoRef } from "../types.js";
import { createChildLogger } from "../utils/logger.js";
import { probeVideo, runFfmpeg, type FfmpegOptions } from "./ffmpeg.js";

const log = createChildLogger({ module: "extract" });

/** ffmpeg `fps` filter value for one frame every `interval` seconds. */
export function fpsForInterval(interval: number): string {
  return interval === 1 ? "1" : String(1 / interval);
}

async function listOwnFrames(dir: string, videoName: string): Promise<string[]> {
  const files = await readdir(dir);
  return files.filter((f) => parseFrameFileName(f, videoName) !== null).sort();
}

/**
 * Samples frames with ffmpeg, scaled to 720px high, into the video's
 * directory-level frames/ folder. Frames left over from an earlier
 * extraction of the same video are removed first.
 */
export class FfmpegFrameExtractor implements Extractor {
  constructor(private readonly ffmpeg: FfmpegOptions) {}

  async extract(video: VideoRef, options: ExtractOptions): Promise<ExtractionResult> {
    const dir = framesDir(video);

    try {
      await probeVideo(video.path, this.ffmpeg);

      await mkdir(dir, { recursive: true });
      for (const stale of await listOwnFrames(dir, video.name)) {
        await unlink(path.join(dir, stale));
      }

      log.debug(`Extracting frames every ${options.interval}s`, { video: video.name, framesDir: dir });

      const stderr = await runFfmpeg([
        "-hide_banner",
        "-i", video.path,
        "-vf", `fps=${fpsForInterval(options.interval)},scale=-2:720:flags=lanczos`,
        "-q:v", "2",
        "-y",
        framePattern(video),
      ], this.ffmpeg);
      log.debug(`ffmpeg output: ${stderr.slice(-500)}`, { video: video.name });
    } catch (err) {
      throw new CollaboratorError("extraction", video.name, `Frame extraction failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    const frames = await listOwnFrames(dir, video.name);
    if (frames.length === 0) {
      throw new CollaboratorError("extraction", video.name, "ffmpeg produced no frames");
    }

    log.info(`Extracted ${frames.length} frames`, { video: video.name });
    return { framesDir: dir, frameCount: frames.length };
  }
}
