#!/usr/bin/env node
import { FsArtifactStore } from "./artifacts/store.js";
import { buildProgram } from "./cli/program.js";
import { confirm } from "./cli/prompt.js";
import { createCollaborators } from "./collaborators.js";
import { loadConfig } from "./config.js";
import { logger } from "./utils/logger.js";

async function main() {
  const program = buildProgram({
    store: new FsArtifactStore(),
    loadConfig: () => loadConfig(),
    createCollaborators,
    confirm,
    setExitCode: (code) => {
      process.exitCode = code;
    },
    print: (line) => {
      process.stdout.write(`${line}\n`);
    },
  });

  await program.parseAsync(process.argv);
}

main().catch((err) => {
  logger.error("Fatal error", { error: err.message, stack: err.stack });
  process.exit(1);
});
