import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { z } from "zod";
import { createChildLogger } from "../utils/logger.js";

const execFileAsync = promisify(execFile);

const log = createChildLogger({ module: "ffmpeg" });

export interface FfmpegOptions {
  ffmpegPath: string;
  ffprobePath: string;
  timeoutMs: number;
}

export interface VideoProbe {
  durationSeconds: number;
  fps: number;
}

const DEFAULT_FPS = 30;

const probeSchema = z.object({
  streams: z.array(z.object({ r_frame_rate: z.string().optional() })).optional(),
  format: z.object({ duration: z.string().optional() }).optional(),
});

/** Parse ffprobe's `30000/1001` style frame rate. */
export function parseFrameRate(rate: string | undefined): number | null {
  if (!rate) return null;
  const [num, den = "1"] = rate.split("/");
  const value = Number(num) / Number(den);
  return Number.isFinite(value) && value > 0 ? value : null;
}

/**
 * Duration and frame rate of the first video stream. Throws when the
 * duration cannot be determined; a missing frame rate falls back to 30fps.
 */
export async function probeVideo(videoPath: string, options: FfmpegOptions): Promise<VideoProbe> {
  const { stdout } = await execFileAsync(options.ffprobePath, [
    "-v", "error",
    "-select_streams", "v:0",
    "-show_entries", "stream=r_frame_rate:format=duration",
    "-of", "json",
    videoPath,
  ], { timeout: options.timeoutMs });

  const data = probeSchema.parse(JSON.parse(stdout));
  const durationSeconds = Number(data.format?.duration);
  if (!Number.isFinite(durationSeconds) || durationSeconds <= 0) {
    throw new Error(`Could not determine duration of ${videoPath}`);
  }

  const fps = parseFrameRate(data.streams?.[0]?.r_frame_rate);
  if (fps === null) {
    log.warn(`Could not detect video FPS for ${videoPath}, assuming ${DEFAULT_FPS}fps`);
  }

  return { durationSeconds, fps: fps ?? DEFAULT_FPS };
}

/**
 * Run ffmpeg and return its stderr, where it writes progress and filter
 * reports even on success.
 */
export async function runFfmpeg(args: string[], options: FfmpegOptions): Promise<string> {
  log.debug("Running ffmpeg", { args: args.join(" ") });

  const { stderr } = await execFileAsync(options.ffmpegPath, args, {
    timeout: options.timeoutMs,
    maxBuffer: 64 * 1024 * 1024,
  });

  return stderr;
}
