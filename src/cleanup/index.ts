import path from "node:path";
import { ConfigurationError, errorMessage } from "../errors.js";
import {
  DESCRIPTION_SUFFIX,
  FOLDER_SUFFIX,
  FRAMES_DIR_NAME,
  SCENE_SUFFIX,
} from "../artifacts/paths.js";
import type { ArtifactStore } from "../artifacts/store.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "cleanup" });

export const CLEAN_TARGETS = ["frames", "description", "descriptions", "scenes", "purge"] as const;
export type CleanTarget = (typeof CLEAN_TARGETS)[number];

type Category = Exclude<CleanTarget, "purge">;

const FILE_SUFFIXES: ReadonlyArray<[Category, string]> = [
  ["description", DESCRIPTION_SUFFIX],
  ["descriptions", FOLDER_SUFFIX],
  ["scenes", SCENE_SUFFIX],
];

export function isCleanTarget(value: string): value is CleanTarget {
  return CLEAN_TARGETS.some((target) => target === value);
}

export interface CleanOptions {
  target: CleanTarget;
  root: string;
  /** Skip the purge confirmation. */
  assumeYes?: boolean;
  /** Asked before a purge unless `assumeYes` is set; no answer means no. */
  confirm?: () => Promise<boolean>;
}

export interface CleanResult {
  target: CleanTarget;
  root: string;
  cancelled: boolean;
  deleted: string[];
  errors: Array<{ path: string; message: string }>;
}

async function collect(
  store: ArtifactStore,
  root: string,
  categories: ReadonlySet<Category>,
): Promise<string[]> {
  const matches: string[] = [];

  async function walk(dir: string): Promise<void> {
    const entries = [...(await store.list(dir))].sort((a, b) => (a.name < b.name ? -1 : 1));
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory) {
        if (entry.name === FRAMES_DIR_NAME) {
          if (categories.has("frames")) matches.push(fullPath);
          continue;
        }
        await walk(fullPath);
        continue;
      }
      for (const [category, suffix] of FILE_SUFFIXES) {
        if (categories.has(category) && entry.name.endsWith(suffix)) {
          matches.push(fullPath);
        }
      }
    }
  }

  await walk(root);
  return matches;
}

/**
 * Delete intermediate artifacts of one category under `root`. Deletion is
 * per entry: a failure is recorded and the rest still go. `purge` removes
 * every category and only after confirmation.
 */
export async function cleanArtifacts(store: ArtifactStore, options: CleanOptions): Promise<CleanResult> {
  const root = path.resolve(options.root);
  const result: CleanResult = { target: options.target, root, cancelled: false, deleted: [], errors: [] };

  if (!(await store.isDirectory(root))) {
    throw new ConfigurationError(`Directory not found: ${root}`);
  }

  if (options.target === "purge" && !options.assumeYes) {
    const confirmed = options.confirm ? await options.confirm() : false;
    if (!confirmed) {
      log.info("Purge cancelled", { root });
      return { ...result, cancelled: true };
    }
  }

  const categories = new Set<Category>(
    options.target === "purge" ? ["frames", "description", "descriptions", "scenes"] : [options.target],
  );
  const targets = await collect(store, root, categories);

  if (targets.length === 0) {
    log.info(`Nothing to delete for '${options.target}'`, { root });
    return result;
  }

  for (const target of targets) {
    try {
      if (await store.remove(target)) {
        result.deleted.push(target);
        log.debug(`Deleted: ${target}`);
      }
    } catch (err) {
      const message = errorMessage(err);
      result.errors.push({ path: target, message });
      log.warn(`Error deleting ${target}`, { error: message });
    }
  }

  log.info(`Deleted ${result.deleted.length} item(s) for '${options.target}'`, {
    root,
    errors: result.errors.length,
  });
  return result;
}
