import { readFile } from "node:fs/promises";
import { ChatAnthropic } from "@langchain/anthropic";
import { HumanMessage } from "@langchain/core/messages";
import { CollaboratorError, errorMessage } from "../errors.js";
import type { FrameDescriptionDocument } from "../artifacts/documents.js";
import type { Describer, FrameInput } from "../pipeline/types.js";
import type { VideoRef } from "../types.js";
import { createChildLogger } from "../utils/logger.js";
import { mapWithConcurrency } from "../utils/pool.js";

const log = createChildLogger({ module: "describer" });

export interface VisionDescriberOptions {
  apiKey: string;
  model: string;
  prompt: string;
  maxTokens: number;
  /** Frames of one video described in parallel. */
  concurrency: number;
}

type MessageContent = HumanMessage["content"];

export function contentToText(content: MessageContent): string {
  if (typeof content === "string") return content;
  return content
    .filter((block): block is { type: "text"; text: string } => block.type === "text" && "text" in block)
    .map((block) => block.text)
    .join("\n");
}

/**
 * Describes frames with a vision model. Any frame that fails fails the whole
 * video; a partial description document is never returned.
 */
export class VisionDescriber implements Describer {
  private readonly model: ChatAnthropic;

  constructor(private readonly options: VisionDescriberOptions) {
    this.model = new ChatAnthropic({
      model: options.model,
      anthropicApiKey: options.apiKey,
      maxTokens: options.maxTokens,
    });
  }

  async describeFrame(framePath: string): Promise<string> {
    const image = await readFile(framePath);

    const response = await this.model.invoke([
      new HumanMessage({
        content: [
          { type: "text", text: this.options.prompt },
          {
            type: "image_url",
            image_url: { url: `data:image/png;base64,${image.toString("base64")}` },
          },
        ],
      }),
    ]);

    return contentToText(response.content).trim();
  }

  async describe(video: VideoRef, frames: FrameInput[]): Promise<FrameDescriptionDocument> {
    log.info(`Describing ${frames.length} frames using ${this.options.concurrency} workers`, {
      video: video.name,
      model: this.options.model,
    });

    let completed = 0;
    const texts = await mapWithConcurrency(frames, this.options.concurrency, async (frame) => {
      try {
        const text = await this.describeFrame(frame.path);
        completed++;
        if (completed % 25 === 0 || completed === frames.length) {
          log.debug(`Described ${completed}/${frames.length} frames`, { video: video.name });
        }
        return text;
      } catch (err) {
        throw new CollaboratorError(
          "description",
          video.name,
          `Description failed for frame ${frame.frameNumber}: ${errorMessage(err)}`,
          { cause: err },
        );
      }
    });

    const document: FrameDescriptionDocument = {};
    frames.forEach((frame, i) => {
      document[frame.timestamp] = texts[i];
    });
    return document;
  }
}
