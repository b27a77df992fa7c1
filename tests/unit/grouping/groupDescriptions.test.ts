import { describe, it, expect } from "vitest";
import { serializeDocument } from "../../../src/artifacts/documents.js";
import { ConfigurationError, GroupingInputError } from "../../../src/errors.js";
import { buildVideoResult, groupDescriptions, groupVideo } from "../../../src/grouping/index.js";
import type { VideoRef } from "../../../src/types.js";
import { MemoryArtifactStore } from "../../helpers/memoryArtifactStore.js";

const video: VideoRef = { path: "/videos/clip.mp4", directory: "/videos", name: "clip" };

const sceneDocument = {
  video_file: "/videos/clip.mp4",
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
};

describe("groupDescriptions", () => {
  it("merges a frame whose description is similar to the run's first frame", () => {
    const runs = groupDescriptions(
      {
        "000:00:00.000": "a red car",
        "000:00:01.000": "a red car on the road",
        "000:00:02.000": "a blue bicycle",
      },
      0.5,
    );

    expect(runs).toEqual([
      { start_time: "000:00:00.000", end_time: "000:00:01.000", description: "a red car" },
      { start_time: "000:00:02.000", end_time: "000:00:02.000", description: "a blue bicycle" },
    ]);
  });

  it("returns no runs for an empty document", () => {
    expect(groupDescriptions({}, 0.8)).toEqual([]);
  });

  it("produces one run for a single frame", () => {
    expect(groupDescriptions({ "000:00:05.000": "A dog." }, 0.8)).toEqual([
      { start_time: "000:00:05.000", end_time: "000:00:05.000", description: "A dog." },
    ]);
  });

  it("merges when the ratio equals the threshold exactly", () => {
    const runs = groupDescriptions({ "000:00:00.000": "abcd", "000:00:01.000": "abcx" }, 0.75);
    expect(runs).toHaveLength(1);
  });

  it("compares against the anchor, not the previous frame", () => {
    // each step is similar to its neighbour, but "abxx" drifts too far from "abcd"
    const runs = groupDescriptions(
      {
        "000:00:00.000": "abcd",
        "000:00:01.000": "abcx",
        "000:00:02.000": "abxx",
      },
      0.75,
    );

    expect(runs).toEqual([
      { start_time: "000:00:00.000", end_time: "000:00:01.000", description: "abcd" },
      { start_time: "000:00:02.000", end_time: "000:00:02.000", description: "abxx" },
    ]);
  });

  it("ignores case and punctuation when comparing but reports the original text", () => {
    const runs = groupDescriptions(
      {
        "000:00:00.000": "A red car!",
        "000:00:01.000": "a red car",
      },
      1,
    );
    expect(runs).toEqual([
      { start_time: "000:00:00.000", end_time: "000:00:01.000", description: "A red car!" },
    ]);
  });

  it("orders frames by timestamp whatever the key order", () => {
    const runs = groupDescriptions(
      {
        "000:00:02.000": "a boat",
        "000:00:00.000": "a house",
        "000:00:01.000": "a house",
      },
      0.8,
    );
    expect(runs.map((r) => [r.start_time, r.end_time])).toEqual([
      ["000:00:00.000", "000:00:01.000"],
      ["000:00:02.000", "000:00:02.000"],
    ]);
  });

  it("covers every frame with non-overlapping runs", () => {
    const doc: Record<string, string> = {};
    const texts = ["a cat", "a cat sitting", "a tree", "a tall tree", "a dog", "sunset"];
    texts.forEach((text, i) => {
      doc[`000:00:0${i}.000`] = text;
    });

    const runs = groupDescriptions(doc, 0.6);
    const keys = Object.keys(doc).sort();
    let cursor = 0;
    for (const run of runs) {
      expect(run.start_time).toBe(keys[cursor]);
      cursor = keys.indexOf(run.end_time) + 1;
    }
    expect(cursor).toBe(keys.length);
  });

  it("never produces more runs at a lower threshold", () => {
    const doc = {
      "000:00:00.000": "a red car",
      "000:00:01.000": "a red car on the road",
      "000:00:02.000": "a blue bicycle",
      "000:00:03.000": "a blue bike",
    };
    const counts = [0, 0.25, 0.5, 0.75, 1].map((t) => groupDescriptions(doc, t).length);
    for (let i = 1; i < counts.length; i++) {
      expect(counts[i]).toBeGreaterThanOrEqual(counts[i - 1]);
    }
    expect(counts[0]).toBe(1);
    expect(counts[4]).toBe(4);
  });

  it("rejects thresholds outside [0, 1]", () => {
    expect(() => groupDescriptions({}, 1.5)).toThrow(ConfigurationError);
    expect(() => groupDescriptions({}, -0.1)).toThrow(ConfigurationError);
  });
});

describe("buildVideoResult", () => {
  it("attaches scenes-info without the video file", () => {
    const result = buildVideoResult({ "000:00:00.000": "a hill" }, sceneDocument, 0.8);

    expect(result["scenes-info"]).toEqual({
      scene_threshold: 0.4,
      total_scenes: 1,
      scenes: sceneDocument.scenes,
    });
  });

  it("uses null scenes-info without a scene document", () => {
    expect(buildVideoResult({}, null)).toEqual({ timestamps: [], "scenes-info": null });
  });

  it("serializes identically on repeated runs", () => {
    const doc = { "000:00:00.000": "a red car", "000:00:01.000": "a red car on the road" };
    expect(serializeDocument(buildVideoResult(doc, sceneDocument, 0.5))).toBe(
      serializeDocument(buildVideoResult(doc, sceneDocument, 0.5)),
    );
  });
});

describe("groupVideo", () => {
  it("reads both documents from the store", async () => {
    const store = new MemoryArtifactStore()
      .addFile("/videos/clip.description.json", JSON.stringify({ "000:00:00.000": "a hill" }))
      .addFile("/videos/clip.scene.json", JSON.stringify(sceneDocument));

    const result = await groupVideo(store, video, 0.8);

    expect(result.timestamps).toEqual([
      { start_time: "000:00:00.000", end_time: "000:00:00.000", description: "a hill" },
    ]);
    expect(result["scenes-info"]?.total_scenes).toBe(1);
  });

  it("accepts a description document wrapped under a single video key", async () => {
    const store = new MemoryArtifactStore().addFile(
      "/videos/clip.description.json",
      JSON.stringify({ videos: { clip: { "000:00:00.000": "a hill" } } }),
    );

    const result = await groupVideo(store, video, 0.8);
    expect(result.timestamps).toHaveLength(1);
  });

  it("groups without scenes when the scene document is missing or corrupt", async () => {
    const store = new MemoryArtifactStore()
      .addFile("/videos/clip.description.json", JSON.stringify({ "000:00:00.000": "a hill" }))
      .addFile("/videos/clip.scene.json", "{ not json");

    const result = await groupVideo(store, video, 0.8);
    expect(result["scenes-info"]).toBeNull();
  });

  it("fails when the description document is missing", async () => {
    const store = new MemoryArtifactStore().addDirectory("/videos");
    await expect(groupVideo(store, video, 0.8)).rejects.toBeInstanceOf(GroupingInputError);
  });

  it("fails when the description document has the wrong shape", async () => {
    const store = new MemoryArtifactStore().addFile(
      "/videos/clip.description.json",
      JSON.stringify({ "000:00:00.000": 42 }),
    );
    await expect(groupVideo(store, video, 0.8)).rejects.toBeInstanceOf(GroupingInputError);
  });
});
