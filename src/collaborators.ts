import { VisionDescriber } from "./agents/describer.js";
import type { AppConfig } from "./config.js";
import { ConfigurationError } from "./errors.js";
import type { Collaborators } from "./pipeline/types.js";
import { FfmpegSceneDetector } from "./tools/detectScenes.js";
import { FfmpegFrameExtractor } from "./tools/extractFrames.js";
import type { FfmpegOptions } from "./tools/ffmpeg.js";
import type { StageKind } from "./types.js";

/**
 * Build the external collaborators the given stages need. The vision
 * describer is only created (and the API key only required) when the
 * description stage is selected.
 */
export function createCollaborators(
  config: AppConfig,
  stages: readonly StageKind[],
): Partial<Collaborators> {
  const ffmpeg: FfmpegOptions = {
    ffmpegPath: config.ffmpegPath,
    ffprobePath: config.ffprobePath,
    timeoutMs: config.ffmpegTimeoutMs,
  };

  const collaborators: Partial<Collaborators> = {};

  if (stages.includes("extraction")) {
    collaborators.extractor = new FfmpegFrameExtractor(ffmpeg);
  }
  if (stages.includes("scene-detection")) {
    collaborators.sceneDetector = new FfmpegSceneDetector(ffmpeg);
  }
  if (stages.includes("description")) {
    if (!config.anthropicApiKey) {
      throw new ConfigurationError("ANTHROPIC_API_KEY environment variable is required to describe frames");
    }
    collaborators.describer = new VisionDescriber({
      apiKey: config.anthropicApiKey,
      model: config.describeModel,
      prompt: config.describePrompt,
      maxTokens: config.describeMaxTokens,
      concurrency: config.describeConcurrency,
    });
  }

  return collaborators;
}
