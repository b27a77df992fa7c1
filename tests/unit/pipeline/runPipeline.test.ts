import { describe, it, expect, beforeEach } from "vitest";
import { ConfigurationError } from "../../../src/errors.js";
import { runPipeline } from "../../../src/pipeline/index.js";
import { MemoryArtifactStore } from "../../helpers/memoryArtifactStore.js";
import { createFakeCollaborators } from "../../helpers/fakeCollaborators.js";

const FOLDER_DOC = "/videos/videos.descriptions.json";

/** Store whose reads of one path fail like an unreadable file would. */
class UnreadableArtifactStore extends MemoryArtifactStore {
  constructor(private readonly unreadable: string) {
    super();
  }

  override async readText(artifactPath: string): Promise<string | null> {
    if (artifactPath === this.unreadable) {
      throw new Error(`EACCES: permission denied, open '${artifactPath}'`);
    }
    return super.readText(artifactPath);
  }
}

function readJson(store: MemoryArtifactStore, filePath: string): unknown {
  const raw = store.files.get(filePath);
  return raw === undefined ? undefined : JSON.parse(raw);
}

describe("runPipeline", () => {
  let store: MemoryArtifactStore;
  let fakes: ReturnType<typeof createFakeCollaborators>;

  beforeEach(() => {
    store = new MemoryArtifactStore().addFile("/videos/beta.mp4").addFile("/videos/alpha.mp4");
    fakes = createFakeCollaborators(store);
  });

  it("runs every stage and writes the folder document", async () => {
    const summary = await runPipeline({ store, collaborators: fakes.collaborators }, { root: "/videos" });

    expect(summary.videosFound).toBe(2);
    expect(summary.videosSucceeded).toBe(2);
    expect(summary.directories).toHaveLength(1);
    expect(summary.directories[0].folderDocument).toBe(FOLDER_DOC);
    expect(summary.directories[0].states.alpha).toEqual({
      extraction: "done",
      "scene-detection": "done",
      description: "done",
      grouping: "done",
    });

    const doc = readJson(store, FOLDER_DOC);
    expect(doc).toEqual({
      folder: "videos",
      videos: {
        alpha: {
          timestamps: [
            {
              start_time: "000:00:00.000",
              end_time: "000:00:02.000",
              description: "alpha on a quiet street",
            },
          ],
          "scenes-info": {
            scene_threshold: 0.4,
            total_scenes: 1,
            scenes: [
              {
                scene_number: 1,
                start_time: "000:00:00.000",
                end_time: "000:00:03.000",
                duration_seconds: 3,
                scene_changes: [],
              },
            ],
          },
        },
        beta: {
          timestamps: [
            {
              start_time: "000:00:00.000",
              end_time: "000:00:02.000",
              description: "beta on a quiet street",
            },
          ],
          "scenes-info": {
            scene_threshold: 0.4,
            total_scenes: 1,
            scenes: [
              {
                scene_number: 1,
                start_time: "000:00:00.000",
                end_time: "000:00:03.000",
                duration_seconds: 3,
                scene_changes: [],
              },
            ],
          },
        },
      },
    });
  });

  it("passes the configured interval and thresholds to the collaborators", async () => {
    await runPipeline(
      { store, collaborators: fakes.collaborators },
      { root: "/videos", interval: 2, sceneThreshold: 0.3 },
    );

    expect(fakes.extractor.extract).toHaveBeenCalledWith(expect.objectContaining({ name: "alpha" }), {
      interval: 2,
    });
    expect(fakes.sceneDetector.detect).toHaveBeenCalledWith(expect.objectContaining({ name: "alpha" }), {
      threshold: 0.3,
    });
    const frames = fakes.describer.describe.mock.calls[0][1];
    expect(frames.map((f) => f.timestamp)).toEqual(["000:00:00.000", "000:00:02.000", "000:00:04.000"]);
  });

  it("records the sampling interval next to the frames", async () => {
    await runPipeline(
      { store, collaborators: fakes.collaborators },
      { root: "/videos", stages: ["extraction"], interval: 2 },
    );

    expect(readJson(store, "/videos/frames/alpha.frames.json")).toEqual({ interval: 2, frame_count: 3 });
  });

  it("times frames by the interval they were extracted at", async () => {
    store
      .addFile("/videos/frames/alpha_0001.png")
      .addFile("/videos/frames/alpha_0002.png")
      .addFile("/videos/frames/alpha.frames.json", JSON.stringify({ interval: 5, frame_count: 2 }));

    await runPipeline(
      { store, collaborators: fakes.collaborators },
      { root: "/videos", stages: ["description"], interval: 1 },
    );

    expect(fakes.describer.describe).toHaveBeenCalledOnce();
    const frames = fakes.describer.describe.mock.calls[0][1];
    expect(frames.map((f) => f.timestamp)).toEqual(["000:00:00.000", "000:00:05.000"]);
  });

  it("falls back to the given interval when the frame manifest is unusable", async () => {
    store
      .addFile("/videos/frames/alpha_0001.png")
      .addFile("/videos/frames/alpha_0002.png")
      .addFile("/videos/frames/alpha.frames.json", JSON.stringify({ frame_count: 2 }));

    await runPipeline(
      { store, collaborators: fakes.collaborators },
      { root: "/videos", stages: ["description"], interval: 3 },
    );

    const frames = fakes.describer.describe.mock.calls[0][1];
    expect(frames.map((f) => f.timestamp)).toEqual(["000:00:00.000", "000:00:03.000"]);
  });

  it("isolates a failing video from its siblings", async () => {
    fakes.extractor.extract.mockImplementationOnce(async () => {
      throw new Error("ffmpeg exited with code 1");
    });

    const summary = await runPipeline({ store, collaborators: fakes.collaborators }, { root: "/videos" });
    const dir = summary.directories[0];

    expect(summary.videosSucceeded).toBe(1);
    expect(dir.succeeded).toEqual(["beta"]);
    expect(dir.failures).toEqual([
      { video: "alpha", stage: "extraction", message: "ffmpeg exited with code 1" },
    ]);
    expect(dir.states.alpha.extraction).toBe("failed");
    expect(dir.states.alpha.grouping).toBe("pending");
    expect(summary.stages.extraction).toEqual({ executed: 1, skipped: 0, failed: 1 });

    const doc = readJson(store, FOLDER_DOC);
    expect(Object.keys((doc as { videos: object }).videos)).toEqual(["beta"]);
  });

  it("records a failing artifact check against its stage and keeps the siblings going", async () => {
    const unreadable = new UnreadableArtifactStore("/videos/alpha.scene.json")
      .addFile("/videos/beta.mp4")
      .addFile("/videos/alpha.mp4");
    const collaborators = createFakeCollaborators(unreadable).collaborators;

    const summary = await runPipeline({ store: unreadable, collaborators }, { root: "/videos" });
    const dir = summary.directories[0];

    expect(dir.succeeded).toEqual(["beta"]);
    expect(dir.failures).toEqual([
      {
        video: "alpha",
        stage: "scene-detection",
        message: "EACCES: permission denied, open '/videos/alpha.scene.json'",
      },
    ]);
    expect(dir.states.alpha["scene-detection"]).toBe("failed");
    expect(summary.stages["scene-detection"]).toEqual({ executed: 1, skipped: 0, failed: 1 });
    expect(dir.folderDocument).toBe(FOLDER_DOC);
    const doc = readJson(unreadable, FOLDER_DOC);
    expect(Object.keys((doc as { videos: object }).videos)).toEqual(["beta"]);
  });

  it("excludes a video whose scene detection failed", async () => {
    fakes.sceneDetector.detect.mockRejectedValue(new Error("probe failed"));

    const summary = await runPipeline({ store, collaborators: fakes.collaborators }, { root: "/videos" });

    expect(summary.videosSucceeded).toBe(0);
    expect(summary.directories[0].folderDocument).toBeNull();
    expect(store.files.has(FOLDER_DOC)).toBe(false);
  });

  it("skips stages whose artifacts already exist", async () => {
    await runPipeline({ store, collaborators: fakes.collaborators }, { root: "/videos" });
    const before = store.files.get("/videos/alpha.description.json");

    const summary = await runPipeline({ store, collaborators: fakes.collaborators }, { root: "/videos" });

    expect(fakes.extractor.extract).toHaveBeenCalledTimes(2);
    expect(fakes.sceneDetector.detect).toHaveBeenCalledTimes(2);
    expect(fakes.describer.describe).toHaveBeenCalledTimes(2);
    expect(summary.stages.description).toEqual({ executed: 0, skipped: 2, failed: 0 });
    expect(summary.stages.grouping).toEqual({ executed: 2, skipped: 0, failed: 0 });
    expect(store.files.get("/videos/alpha.description.json")).toBe(before);
  });

  it("does not call the describer for a valid description document", async () => {
    const existing = JSON.stringify({ "000:00:00.000": "kept" });
    store.addFile("/videos/alpha.description.json", existing);

    await runPipeline({ store, collaborators: fakes.collaborators }, { root: "/videos", stages: ["description"] });

    expect(store.files.get("/videos/alpha.description.json")).toBe(existing);
    expect(fakes.describer.describe).not.toHaveBeenCalled();
  });

  it("regenerates a corrupt description document", async () => {
    store.addFile("/videos/alpha.description.json", "{ half written");
    store.addFile("/videos/frames/alpha_0001.png");
    store.addFile("/videos/frames/beta_0001.png");

    await runPipeline({ store, collaborators: fakes.collaborators }, { root: "/videos", stages: ["description"] });

    expect(fakes.describer.describe).toHaveBeenCalledTimes(2);
    expect(readJson(store, "/videos/alpha.description.json")).toEqual({
      "000:00:00.000": "alpha on a quiet street",
    });
  });

  it("regenerates everything when forced", async () => {
    await runPipeline({ store, collaborators: fakes.collaborators }, { root: "/videos" });
    await runPipeline({ store, collaborators: fakes.collaborators }, { root: "/videos", force: true });

    expect(fakes.extractor.extract).toHaveBeenCalledTimes(4);
    expect(fakes.describer.describe).toHaveBeenCalledTimes(4);
  });

  it("fails description when there are no frames", async () => {
    const summary = await runPipeline(
      { store, collaborators: { describer: fakes.describer } },
      { root: "/videos", stages: ["description"] },
    );

    expect(summary.directories[0].failures.map((f) => f.stage)).toEqual(["description", "description"]);
    expect(summary.directories[0].failures[0].message).toBe(
      "No frames found for alpha; run extraction first",
    );
    expect(fakes.describer.describe).not.toHaveBeenCalled();
  });

  it("groups only the videos with a description document", async () => {
    store.addFile("/videos/beta.description.json", JSON.stringify({ "000:00:00.000": "a pier" }));

    const summary = await runPipeline({ store, collaborators: {} }, { root: "/videos", stages: ["grouping"] });

    expect(summary.directories[0].succeeded).toEqual(["beta"]);
    expect(summary.directories[0].failures).toEqual([
      {
        video: "alpha",
        stage: "grouping",
        message: "Description document not found: /videos/alpha.description.json",
      },
    ]);
    expect(readJson(store, FOLDER_DOC)).toEqual({
      folder: "videos",
      videos: {
        beta: {
          timestamps: [{ start_time: "000:00:00.000", end_time: "000:00:00.000", description: "a pier" }],
          "scenes-info": null,
        },
      },
    });
  });

  it("runs videos concurrently up to the limit", async () => {
    store.addFile("/videos/gamma.mp4");
    let inFlight = 0;
    let peak = 0;
    const extract = fakes.extractor.extract.getMockImplementation();
    fakes.extractor.extract.mockImplementation(async (video, options) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 10));
      inFlight--;
      if (!extract) throw new Error("missing fake");
      return extract(video, options);
    });

    const summary = await runPipeline(
      { store, collaborators: fakes.collaborators },
      { root: "/videos", concurrency: 2 },
    );

    expect(peak).toBe(2);
    expect(summary.videosSucceeded).toBe(3);
    expect(Object.keys((readJson(store, FOLDER_DOC) as { videos: object }).videos)).toEqual([
      "alpha",
      "beta",
      "gamma",
    ]);
  });

  it("writes one folder document per directory", async () => {
    store.addFile("/videos/nested/delta.mp4");

    const summary = await runPipeline({ store, collaborators: fakes.collaborators }, { root: "/videos" });

    expect(summary.directories.map((d) => d.folderDocument)).toEqual([
      FOLDER_DOC,
      "/videos/nested/nested.descriptions.json",
    ]);
  });

  it("succeeds with no videos and writes nothing", async () => {
    const empty = new MemoryArtifactStore().addDirectory("/empty");

    const summary = await runPipeline({ store: empty, collaborators: fakes.collaborators }, { root: "/empty" });

    expect(summary.videosFound).toBe(0);
    expect(summary.directories).toEqual([]);
    expect(empty.writes).toEqual([]);
  });

  it("rejects a missing root", async () => {
    await expect(
      runPipeline({ store, collaborators: fakes.collaborators }, { root: "/nowhere" }),
    ).rejects.toBeInstanceOf(ConfigurationError);
  });

  it("rejects a selected stage without its collaborator", async () => {
    await expect(
      runPipeline({ store, collaborators: {} }, { root: "/videos", stages: ["extraction"] }),
    ).rejects.toThrow("No extractor configured for this command");
  });

  it("rejects invalid options before any work", async () => {
    await expect(
      runPipeline({ store, collaborators: fakes.collaborators }, { root: "/videos", groupingThreshold: 1.5 }),
    ).rejects.toBeInstanceOf(ConfigurationError);
    expect(fakes.extractor.extract).not.toHaveBeenCalled();
  });
});
