/**
 * Contract audit CLI
 *
 * Usage:
 *   npx tsx packages/engine/src/cli.ts [scan|generate|verify] [options]
 */

import { runCommand } from "./cli/commands";

runCommand(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error("Fatal error:", err);
    process.exit(1);
  });
