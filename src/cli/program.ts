import path from "node:path";
import { Command } from "commander";
import type { ArtifactStore } from "../artifacts/store.js";
import { cleanArtifacts, CLEAN_TARGETS, isCleanTarget, type CleanTarget } from "../cleanup/index.js";
import {
  parsePositiveInt,
  parsePositiveNumber,
  parseUnitInterval,
  type AppConfig,
} from "../config.js";
import { ConfigurationError } from "../errors.js";
import { DEFAULT_GROUPING_THRESHOLD } from "../grouping/index.js";
import {
  ALL_STAGES,
  DEFAULT_FRAME_INTERVAL,
  runPipeline,
  type Collaborators,
  type PipelineOptions,
  type RunSummary,
} from "../pipeline/index.js";
import { DEFAULT_SCENE_THRESHOLD } from "../tools/detectScenes.js";
import type { StageKind } from "../types.js";
import { createChildLogger, setLogLevel } from "../utils/logger.js";

const log = createChildLogger({ module: "cli" });

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;

/** Intermediates removed by `run --clean`; folder documents stay. */
const RUN_CLEAN_TARGETS: readonly CleanTarget[] = ["frames", "description", "scenes"];

export interface CliDeps {
  store: ArtifactStore;
  loadConfig: () => AppConfig;
  createCollaborators: (config: AppConfig, stages: readonly StageKind[]) => Partial<Collaborators>;
  confirm: (question: string) => Promise<boolean>;
  setExitCode: (code: number) => void;
  /** Command output (one path per line), kept apart from the log. */
  print: (line: string) => void;
}

interface StageCommandOptions {
  verbose?: boolean;
  force?: boolean;
  interval?: string;
  threshold?: string;
}

interface RunCommandOptions {
  verbose?: boolean;
  force?: boolean;
  interval?: string;
  sceneThreshold?: string;
  threshold?: string;
  concurrency?: string;
  clean?: boolean;
}

interface CleanCommandOptions {
  verbose?: boolean;
  yes?: boolean;
}

/** Non-zero only when there were videos and none of them made it. */
export function exitCodeFor(summary: RunSummary): number {
  return summary.videosFound > 0 && summary.videosSucceeded === 0 ? EXIT_FAILURE : EXIT_SUCCESS;
}

export function buildProgram(deps: CliDeps): Command {
  const program = new Command();

  program
    .name("scene-digest")
    .description("Turn folders of videos into per-folder digests of deduplicated frame descriptions")
    .showHelpAfterError("(use --help for available options)");

  /** Configuration errors end the command with exit code 1; anything else is fatal. */
  function guarded<A extends unknown[]>(fn: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
    return async (...args: A) => {
      try {
        await fn(...args);
      } catch (err) {
        if (err instanceof ConfigurationError) {
          log.error(err.message);
          deps.setExitCode(EXIT_FAILURE);
          return;
        }
        throw err;
      }
    };
  }

  /** Load the configuration and apply its log level; `--verbose` wins. */
  function configure(verbose: boolean | undefined): AppConfig {
    const config = deps.loadConfig();
    setLogLevel(verbose ? "debug" : config.logLevel);
    return config;
  }

  function intervalOption(raw: string | undefined): number | undefined {
    return raw === undefined ? undefined : parsePositiveNumber("--interval", raw);
  }

  async function runStages(
    stages: readonly StageKind[],
    options: Omit<PipelineOptions, "stages">,
    verbose: boolean | undefined,
  ): Promise<RunSummary> {
    const config = configure(verbose);
    const summary = await runPipeline(
      { store: deps.store, collaborators: deps.createCollaborators(config, stages) },
      {
        ...options,
        stages,
        concurrency: options.concurrency ?? config.pipelineConcurrency,
      },
    );
    for (const directory of summary.directories) {
      if (directory.folderDocument) deps.print(directory.folderDocument);
    }
    deps.setExitCode(exitCodeFor(summary));
    return summary;
  }

  program
    .command("extract")
    .description("Sample frames from every video into frames/<name>_NNNN.png")
    .argument("<dir>", "Root directory to scan for videos")
    .option("--interval <seconds>", `Seconds between sampled frames (default: ${DEFAULT_FRAME_INTERVAL})`)
    .option("--force", "Re-extract even when frames exist", false)
    .option("--verbose", "Verbose output", false)
    .action(
      guarded(async (dir: string, options: StageCommandOptions) => {
        await runStages(
          ["extraction"],
          { root: dir, force: options.force, interval: intervalOption(options.interval) },
          options.verbose,
        );
      }),
    );

  program
    .command("scenes")
    .description("Detect scene boundaries and write <name>.scene.json")
    .argument("<dir>", "Root directory to scan for videos")
    .option("--threshold <value>", "Scene change score threshold (0.0-1.0)", String(DEFAULT_SCENE_THRESHOLD))
    .option("--force", "Re-detect even when a scene document exists", false)
    .option("--verbose", "Verbose output", false)
    .action(
      guarded(async (dir: string, options: StageCommandOptions) => {
        await runStages(
          ["scene-detection"],
          {
            root: dir,
            force: options.force,
            sceneThreshold: parseUnitInterval("--threshold", options.threshold ?? DEFAULT_SCENE_THRESHOLD),
          },
          options.verbose,
        );
      }),
    );

  program
    .command("describe")
    .description("Describe every extracted frame and write <name>.description.json")
    .argument("<dir>", "Root directory to scan for videos")
    .option(
      "--interval <seconds>",
      `Seconds between the extracted frames when extraction recorded none (default: ${DEFAULT_FRAME_INTERVAL})`,
    )
    .option("--force", "Re-describe even when a description document exists", false)
    .option("--verbose", "Verbose output", false)
    .action(
      guarded(async (dir: string, options: StageCommandOptions) => {
        await runStages(
          ["description"],
          { root: dir, force: options.force, interval: intervalOption(options.interval) },
          options.verbose,
        );
      }),
    );

  program
    .command("group")
    .description("Group similar consecutive descriptions into <folder>.descriptions.json")
    .argument("<dir>", "Root directory to scan for videos")
    .option("--threshold <value>", "Similarity threshold for merging (0.0-1.0)", String(DEFAULT_GROUPING_THRESHOLD))
    .option("--verbose", "Verbose output", false)
    .action(
      guarded(async (dir: string, options: StageCommandOptions) => {
        await runStages(
          ["grouping"],
          {
            root: dir,
            groupingThreshold: parseUnitInterval("--threshold", options.threshold ?? DEFAULT_GROUPING_THRESHOLD),
          },
          options.verbose,
        );
      }),
    );

  program
    .command("run")
    .description("Run every stage, skipping work whose artifacts already exist")
    .argument("<dir>", "Root directory to scan for videos")
    .option("--interval <seconds>", `Seconds between sampled frames (default: ${DEFAULT_FRAME_INTERVAL})`)
    .option("--scene-threshold <value>", "Scene change score threshold (0.0-1.0)", String(DEFAULT_SCENE_THRESHOLD))
    .option("--threshold <value>", "Similarity threshold for merging (0.0-1.0)", String(DEFAULT_GROUPING_THRESHOLD))
    .option("--concurrency <n>", "Videos processed at the same time (default: PIPELINE_CONCURRENCY)")
    .option("--force", "Regenerate every artifact", false)
    .option("--clean", "Remove frames, description and scene documents after a fully successful run", false)
    .option("--verbose", "Verbose output", false)
    .action(
      guarded(async (dir: string, options: RunCommandOptions) => {
        const summary = await runStages(
          ALL_STAGES,
          {
            root: dir,
            force: options.force,
            interval: intervalOption(options.interval),
            sceneThreshold: parseUnitInterval("--scene-threshold", options.sceneThreshold ?? DEFAULT_SCENE_THRESHOLD),
            groupingThreshold: parseUnitInterval("--threshold", options.threshold ?? DEFAULT_GROUPING_THRESHOLD),
            concurrency:
              options.concurrency === undefined ? undefined : parsePositiveInt("--concurrency", options.concurrency),
          },
          options.verbose,
        );

        if (!options.clean) return;
        if (summary.videosFound === 0 || summary.videosSucceeded < summary.videosFound) {
          log.warn("Some videos failed, keeping intermediate artifacts");
          return;
        }
        for (const target of RUN_CLEAN_TARGETS) {
          await cleanArtifacts(deps.store, { target, root: summary.root, assumeYes: true });
        }
      }),
    );

  program
    .command("clean")
    .description(`Delete intermediate artifacts (${CLEAN_TARGETS.join(", ")})`)
    .argument("<target>", "What to delete")
    .argument("[dir]", "Directory to clean (default: current directory)")
    .option("--yes", "Purge without asking for confirmation", false)
    .option("--verbose", "Verbose output", false)
    .action(
      guarded(async (target: string, dir: string | undefined, options: CleanCommandOptions) => {
        configure(options.verbose);
        if (!isCleanTarget(target)) {
          throw new ConfigurationError(
            `Unknown clean target '${target}'. Expected one of: ${CLEAN_TARGETS.join(", ")}`,
          );
        }

        const root = path.resolve(dir ?? process.cwd());
        const result = await cleanArtifacts(deps.store, {
          target,
          root,
          assumeYes: options.yes,
          confirm: () =>
            deps.confirm(`Delete ALL frames, description, descriptions and scene files under ${root}? [y/N] `),
        });

        if (result.cancelled) {
          log.info("Nothing deleted");
          return;
        }
        for (const deleted of result.deleted) {
          deps.print(deleted);
        }
        for (const failure of result.errors) {
          log.error(`Could not delete ${failure.path}: ${failure.message}`);
        }
      }),
    );

  return program;
}
