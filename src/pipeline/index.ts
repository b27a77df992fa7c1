import path from "node:path";
import { ConfigurationError, CollaboratorError, errorMessage } from "../errors.js";
import {
  frameManifestSchema,
  readDocument,
  writeDocument,
  type FolderDocument,
  type FrameManifest,
  type VideoResult,
} from "../artifacts/documents.js";
import {
  descriptionDocumentPath,
  folderDocumentPath,
  frameManifestPath,
  sceneDocumentPath,
} from "../artifacts/paths.js";
import { deriveStageState, listFrames } from "../artifacts/stageState.js";
import type { ArtifactStore } from "../artifacts/store.js";
import { DEFAULT_GROUPING_THRESHOLD, groupVideo } from "../grouping/index.js";
import { DEFAULT_SCENE_THRESHOLD } from "../tools/detectScenes.js";
import type { StageFailure, StageKind, VideoRef } from "../types.js";
import { createChildLogger, type Logger } from "../utils/logger.js";
import { mapWithConcurrency } from "../utils/pool.js";
import { formatTimestamp, frameNumberToSeconds } from "../utils/timestamps.js";
import { discoverVideos, groupByDirectory } from "./discovery.js";
import type {
  Collaborators,
  DirectorySummary,
  FrameInput,
  RunSummary,
  StageCounts,
  VideoStageStates,
} from "./types.js";

export type {
  Collaborators,
  Describer,
  DirectorySummary,
  Extractor,
  FrameInput,
  RunSummary,
  SceneDetector,
  StageCounts,
  VideoStageStates,
} from "./types.js";
export { discoverVideos, groupByDirectory } from "./discovery.js";

const log = createChildLogger({ module: "pipeline" });

export const ALL_STAGES: readonly StageKind[] = ["extraction", "scene-detection", "description", "grouping"];
export const DEFAULT_FRAME_INTERVAL = 1.0;

export interface PipelineDeps {
  store: ArtifactStore;
  /** Only the collaborators of the selected stages are used. */
  collaborators: Partial<Collaborators>;
}

export interface PipelineOptions {
  root: string;
  /** Stages to run, in pipeline order. Defaults to all of them. */
  stages?: readonly StageKind[];
  /** Regenerate artifacts even when they already exist. */
  force?: boolean;
  /**
   * Seconds between sampled frames. Description uses the interval recorded
   * at extraction when there is one.
   */
  interval?: number;
  sceneThreshold?: number;
  groupingThreshold?: number;
  /** Videos processed at the same time. */
  concurrency?: number;
}

interface ResolvedOptions {
  stages: ReadonlySet<StageKind>;
  force: boolean;
  interval: number;
  intervalGiven: boolean;
  sceneThreshold: number;
  groupingThreshold: number;
  concurrency: number;
}

interface VideoOutcome {
  video: VideoRef;
  states: VideoStageStates;
  result: VideoResult | null;
  failures: StageFailure[];
}

function emptyCounts(): Record<StageKind, StageCounts> {
  return {
    extraction: { executed: 0, skipped: 0, failed: 0 },
    "scene-detection": { executed: 0, skipped: 0, failed: 0 },
    description: { executed: 0, skipped: 0, failed: 0 },
    grouping: { executed: 0, skipped: 0, failed: 0 },
  };
}

function requireCollaborator<K extends keyof Collaborators>(
  deps: PipelineDeps,
  key: K,
): Collaborators[K] {
  const collaborator = deps.collaborators[key];
  if (!collaborator) {
    throw new ConfigurationError(`No ${key} configured for this command`);
  }
  return collaborator;
}

/**
 * Runs the selected stages for one video and never throws: every failure is
 * recorded against the stage that raised it.
 */
class VideoRun {
  readonly outcome: VideoOutcome;
  private readonly vlog: Logger;

  constructor(
    private readonly deps: PipelineDeps,
    private readonly options: ResolvedOptions,
    private readonly counts: Record<StageKind, StageCounts>,
    video: VideoRef,
  ) {
    this.vlog = log.child({ video: video.name });
    this.outcome = {
      video,
      states: {
        extraction: "pending",
        "scene-detection": "pending",
        description: "pending",
        grouping: "pending",
      },
      result: null,
      failures: [],
    };
  }

  private get video(): VideoRef {
    return this.outcome.video;
  }

  /**
   * Run `work` unless the stage's artifact already exists. Returns false when
   * the stage failed.
   */
  private async stage(kind: StageKind, work: () => Promise<void>): Promise<boolean> {
    if (!this.options.stages.has(kind)) return true;

    const startedAt = Date.now();
    try {
      const state = await deriveStageState(this.deps.store, this.video, kind, { force: this.options.force });
      if (state === "done") {
        this.outcome.states[kind] = "done";
        this.counts[kind].skipped++;
        this.vlog.debug("Artifact present, skipping", { stage: kind });
        return true;
      }

      await work();
      this.outcome.states[kind] = "done";
      this.counts[kind].executed++;
      this.vlog.info(`Completed in ${((Date.now() - startedAt) / 1000).toFixed(1)}s`, { stage: kind });
      return true;
    } catch (err) {
      const message = errorMessage(err);
      this.outcome.states[kind] = "failed";
      this.counts[kind].failed++;
      this.outcome.failures.push({ video: this.video.name, stage: kind, message });
      this.vlog.error("Stage failed", { stage: kind, error: message });
      return false;
    }
  }

  private async extract(): Promise<void> {
    const extractor = requireCollaborator(this.deps, "extractor");
    const result = await extractor.extract(this.video, { interval: this.options.interval });
    const manifest: FrameManifest = { interval: this.options.interval, frame_count: result.frameCount };
    await writeDocument(this.deps.store, frameManifestPath(this.video), manifest);
  }

  /** Interval the frames on disk were sampled at. */
  private async frameInterval(): Promise<number> {
    const manifestPath = frameManifestPath(this.video);
    const manifest = await readDocument(this.deps.store, manifestPath, frameManifestSchema);
    if (manifest.status === "missing") return this.options.interval;
    if (manifest.status === "invalid") {
      this.vlog.warn(`Ignoring frame manifest: ${manifest.error.message}`, { stage: "description" });
      return this.options.interval;
    }

    const recorded = manifest.value.interval;
    if (this.options.intervalGiven && recorded !== this.options.interval) {
      this.vlog.warn(
        `Frames were extracted every ${recorded}s, not ${this.options.interval}s; timestamps use ${recorded}s`,
        { stage: "description" },
      );
    }
    return recorded;
  }

  private async detectScenes(): Promise<void> {
    const detector = requireCollaborator(this.deps, "sceneDetector");
    const document = await detector.detect(this.video, { threshold: this.options.sceneThreshold });
    await writeDocument(this.deps.store, sceneDocumentPath(this.video), document);
  }

  private async describe(): Promise<void> {
    const describer = requireCollaborator(this.deps, "describer");
    const frames = await listFrames(this.deps.store, this.video);
    if (frames.length === 0) {
      throw new CollaboratorError(
        "description",
        this.video.name,
        `No frames found for ${this.video.name}; run extraction first`,
      );
    }

    const interval = await this.frameInterval();
    const inputs: FrameInput[] = frames.map((frame) => ({
      path: frame.path,
      frameNumber: frame.frameNumber,
      timestamp: formatTimestamp(frameNumberToSeconds(frame.frameNumber, interval)),
    }));

    const document = await describer.describe(this.video, inputs);
    await writeDocument(this.deps.store, descriptionDocumentPath(this.video), document);
  }

  /**
   * Grouping always runs when selected: the folder document is rebuilt from
   * the current artifacts on every run.
   */
  private async group(): Promise<void> {
    if (!this.options.stages.has("grouping")) return;

    try {
      this.outcome.result = await groupVideo(this.deps.store, this.video, this.options.groupingThreshold);
      this.outcome.states.grouping = "done";
      this.counts.grouping.executed++;
    } catch (err) {
      const message = errorMessage(err);
      this.outcome.states.grouping = "failed";
      this.counts.grouping.failed++;
      this.outcome.failures.push({ video: this.video.name, stage: "grouping", message });
      this.vlog.error("Stage failed", { stage: "grouping", error: message });
    }
  }

  async execute(): Promise<VideoOutcome> {
    if (!(await this.stage("extraction", () => this.extract()))) {
      return this.outcome;
    }

    // no data dependency between the two
    const [scenesOk, descriptionOk] = await Promise.all([
      this.stage("scene-detection", () => this.detectScenes()),
      this.stage("description", () => this.describe()),
    ]);
    if (!scenesOk || !descriptionOk) {
      return this.outcome;
    }

    await this.group();
    return this.outcome;
  }
}

function resolveOptions(options: PipelineOptions, deps: PipelineDeps): ResolvedOptions {
  const resolved: ResolvedOptions = {
    stages: new Set(options.stages ?? ALL_STAGES),
    force: options.force ?? false,
    interval: options.interval ?? DEFAULT_FRAME_INTERVAL,
    intervalGiven: options.interval !== undefined,
    sceneThreshold: options.sceneThreshold ?? DEFAULT_SCENE_THRESHOLD,
    groupingThreshold: options.groupingThreshold ?? DEFAULT_GROUPING_THRESHOLD,
    concurrency: options.concurrency ?? 1,
  };

  if (!(resolved.interval > 0)) {
    throw new ConfigurationError(`Frame interval must be positive (got ${resolved.interval})`);
  }
  for (const [name, value] of [
    ["Scene threshold", resolved.sceneThreshold],
    ["Grouping threshold", resolved.groupingThreshold],
  ] as const) {
    if (!(value >= 0 && value <= 1)) {
      throw new ConfigurationError(`${name} must be between 0.0 and 1.0 (got ${value})`);
    }
  }
  if (!Number.isInteger(resolved.concurrency) || resolved.concurrency < 1) {
    throw new ConfigurationError(`Concurrency must be a positive integer (got ${resolved.concurrency})`);
  }

  // fail before any work when a selected stage has nothing to run it
  if (resolved.stages.has("extraction")) requireCollaborator(deps, "extractor");
  if (resolved.stages.has("scene-detection")) requireCollaborator(deps, "sceneDetector");
  if (resolved.stages.has("description")) requireCollaborator(deps, "describer");

  return resolved;
}

async function finishDirectory(
  store: ArtifactStore,
  directory: string,
  outcomes: VideoOutcome[],
  writeFolder: boolean,
): Promise<DirectorySummary> {
  const failures = outcomes.flatMap((o) => o.failures);
  const succeeded = outcomes.filter((o) => o.failures.length === 0).map((o) => o.video.name);
  const states = Object.fromEntries(outcomes.map((o) => [o.video.name, o.states]));

  if (!writeFolder) {
    return { directory, folderDocument: null, succeeded, failures, states };
  }

  // keyed by identity in name order, whatever order the videos finished in
  const videos: Record<string, VideoResult> = {};
  for (const outcome of [...outcomes].sort((a, b) => (a.video.name < b.video.name ? -1 : 1))) {
    if (outcome.result) videos[outcome.video.name] = outcome.result;
  }

  if (Object.keys(videos).length === 0) {
    log.warn("No video grouped successfully, folder document not written", { directory });
    return { directory, folderDocument: null, succeeded, failures, states };
  }

  const document: FolderDocument = { folder: path.basename(directory), videos };
  const documentPath = folderDocumentPath(directory);
  await writeDocument(store, documentPath, document);
  log.info(`Folder document written with ${Object.keys(videos).length} videos`, { path: documentPath });

  return { directory, folderDocument: documentPath, succeeded, failures, states };
}

function logSummary(summary: RunSummary): void {
  log.info("=== Pipeline Summary ===");
  log.info(`Videos: ${summary.videosSucceeded}/${summary.videosFound} succeeded`);
  for (const [stage, counts] of Object.entries(summary.stages)) {
    if (counts.executed + counts.skipped + counts.failed === 0) continue;
    log.info(`${stage}: ${counts.executed} executed, ${counts.skipped} skipped, ${counts.failed} failed`);
  }
  for (const dir of summary.directories) {
    for (const failure of dir.failures) {
      log.warn(`Failed: ${path.join(dir.directory, failure.video)} (${failure.stage}): ${failure.message}`);
    }
  }
  log.info("=== End ===");
}

/**
 * Run the selected stages for every video under `options.root`.
 *
 * Each directory is handled on its own: its videos go through the stages
 * (up to `concurrency` at a time), and once all of them have finished its
 * folder document is written from the videos that grouped successfully.
 * A failing video never stops its siblings.
 */
export async function runPipeline(deps: PipelineDeps, options: PipelineOptions): Promise<RunSummary> {
  const root = path.resolve(options.root);
  if (!(await deps.store.isDirectory(root))) {
    throw new ConfigurationError(`Directory not found: ${root}`);
  }

  const resolved = resolveOptions(options, deps);
  const counts = emptyCounts();

  const videos = await discoverVideos(deps.store, root);
  log.info(`Found ${videos.length} video file(s)`, { root, stages: [...resolved.stages].join(",") });

  const directories: DirectorySummary[] = [];
  for (const [directory, dirVideos] of groupByDirectory(videos)) {
    log.info(`Processing ${dirVideos.length} video(s)`, { directory });

    const outcomes = await mapWithConcurrency(dirVideos, resolved.concurrency, (video) =>
      new VideoRun(deps, resolved, counts, video).execute(),
    );

    directories.push(
      await finishDirectory(deps.store, directory, outcomes, resolved.stages.has("grouping")),
    );
  }

  const summary: RunSummary = {
    root,
    videosFound: videos.length,
    videosSucceeded: directories.reduce((n, d) => n + d.succeeded.length, 0),
    directories,
    stages: counts,
  };
  logSummary(summary);
  return summary;
}
