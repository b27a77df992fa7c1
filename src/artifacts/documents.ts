import { z } from "zod";
import { ArtifactParseError } from "../errors.js";
import type { ArtifactStore } from "./store.js";

export const frameDescriptionsSchema = z.record(z.string(), z.string());

/** Shape written by older tooling: the same map wrapped under a single video key. */
const wrappedFrameDescriptionsSchema = z.object({
  videos: z
    .record(z.string(), frameDescriptionsSchema)
    .refine((videos) => Object.keys(videos).length === 1, {
      message: "expected exactly one video in a wrapped description document",
    }),
});

export const frameDescriptionDocumentSchema = z.union([
  frameDescriptionsSchema,
  wrappedFrameDescriptionsSchema.transform((doc) => Object.values(doc.videos)[0] ?? {}),
]);

/** Timestamp (`HHH:MM:SS.mmm`) to free-text description, in extraction order. */
export type FrameDescriptionDocument = z.infer<typeof frameDescriptionsSchema>;

export const sceneChangeSchema = z
  .object({
    frame_number: z.number().int().min(0),
    timestamp: z.string(),
    seconds: z.number().min(0),
    scene_score: z.number(),
  })
  .passthrough();

export const sceneRecordSchema = z
  .object({
    scene_number: z.number().int().min(1),
    start_time: z.string(),
    end_time: z.string(),
    duration_seconds: z.number().min(0),
    scene_changes: z.array(sceneChangeSchema),
  })
  .passthrough();

export const sceneDocumentSchema = z
  .object({
    video_file: z.string().optional(),
    scene_threshold: z.number().min(0).max(1),
    total_scenes: z.number().int().min(0),
    scenes: z.array(sceneRecordSchema),
  })
  .passthrough();

/** frames/<name>.frames.json, written after a successful extraction. */
export const frameManifestSchema = z
  .object({
    interval: z.number().positive(),
    frame_count: z.number().int().min(0),
  })
  .passthrough();

export type FrameManifest = z.infer<typeof frameManifestSchema>;

export type SceneChange = z.infer<typeof sceneChangeSchema>;
export type SceneRecord = z.infer<typeof sceneRecordSchema>;
export type SceneDocument = z.infer<typeof sceneDocumentSchema>;

export interface GroupedRun {
  start_time: string;
  end_time: string;
  description: string;
}

export interface ScenesInfo {
  scene_threshold: number;
  total_scenes: number;
  scenes: SceneRecord[];
}

export interface VideoResult {
  timestamps: GroupedRun[];
  "scenes-info": ScenesInfo | null;
}

export interface FolderDocument {
  folder: string;
  videos: Record<string, VideoResult>;
}

export type ArtifactRead<T> =
  | { status: "missing" }
  | { status: "invalid"; error: ArtifactParseError }
  | { status: "ok"; value: T };

/**
 * Read and parse a JSON artifact. Never throws for absent or malformed
 * files; the caller decides whether that is a failure.
 */
export async function readJsonArtifact(
  store: ArtifactStore,
  artifactPath: string,
): Promise<ArtifactRead<unknown>> {
  const raw = await store.readText(artifactPath);
  if (raw === null) return { status: "missing" };

  try {
    const value: unknown = JSON.parse(raw);
    return { status: "ok", value };
  } catch (err) {
    return {
      status: "invalid",
      error: new ArtifactParseError(artifactPath, `Invalid JSON in ${artifactPath}`, { cause: err }),
    };
  }
}

export async function readDocument<T>(
  store: ArtifactStore,
  artifactPath: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Promise<ArtifactRead<T>> {
  const read = await readJsonArtifact(store, artifactPath);
  if (read.status !== "ok") return read;

  const parsed = schema.safeParse(read.value);
  if (!parsed.success) {
    const details = parsed.error.issues
      .slice(0, 3)
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    return {
      status: "invalid",
      error: new ArtifactParseError(artifactPath, `Unexpected document shape in ${artifactPath}: ${details}`),
    };
  }
  return { status: "ok", value: parsed.data };
}

export function serializeDocument(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}

export async function writeDocument(
  store: ArtifactStore,
  artifactPath: string,
  value: unknown,
): Promise<void> {
  await store.writeText(artifactPath, serializeDocument(value));
}
