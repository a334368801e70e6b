/**
 * tasklet config - effective configuration summary
 */
import { resolveConfig } from "@tasklet/core";

export async function runConfig(opts: { json?: boolean; cwd?: string; homeDir?: string }): Promise<number> {
  const resolved = resolveConfig(opts.cwd, opts.homeDir);
  const { maxSteps } = resolved.config.limits;

  if (opts.json) {
    console.log(
      JSON.stringify(
        {
          source: resolved.source,
          path: resolved.path,
          config: resolved.config,
          skipped: resolved.skipped,
        },
        null,
        2
      )
    );
    return 0;
  }

  console.log("Effective tasklet config");
  console.log(`  Source:    ${resolved.source}`);
  console.log(`  Path:      ${resolved.path ?? "(none)"}`);
  console.log(`  Max steps: ${maxSteps ?? "(unlimited)"}`);
  for (const skip of resolved.skipped) {
    console.log(`  Skipped:   ${skip.path} (${skip.reason})`);
  }
  return 0;
}
