import { loadImporterConfig } from "../services/config.js";
import { buildPipelineDeps } from "../services/pipelineDeps.js";
import { runPreview } from "../services/runImportPipeline.js";
import { isSupplierId } from "../types.js";

// Usage: runOne.ts <mouser|digikey> <part number>
async function main() {
  const [supplier = "mouser", partNumber = "RC0603FR-0710KL"] = process.argv.slice(2);
  if (!isSupplierId(supplier)) {
    throw new Error(`Unknown supplier '${supplier}'`);
  }

  const deps = buildPipelineDeps(loadImporterConfig());
  const run = await runPreview(deps, supplier, partNumber);

  console.dir(run, { depth: null });
  if (run.state === "error") process.exitCode = 1;
}

main().catch(err => {
  console.error(err);
  process.exitCode = 1;
});
