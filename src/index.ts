// GitHub stars to GitLab mirror
// Main entry point

export { GitHubClient } from "./api/github-client.js";
export { GitLabClient } from "./api/gitlab-client.js";
export { LocalMirrorStore } from "./sync/mirror.js";
export { mapName } from "./sync/name-mapper.js";
export { syncRepo } from "./sync/repo-syncer.js";
export { syncStars, buildTasks, runPool } from "./orchestration/sync-stars.js";
export { loadConfig, parseConfig } from "./config.js";
export { ApiError, GitCommandError, ConfigError } from "./errors.js";
export type { RepoRecord, SyncTask, SyncSummary } from "./types.js";

import { appendFile } from "fs/promises";
import { fileURLToPath } from "url";
import { GitHubClient } from "./api/github-client.js";
import { GitLabClient } from "./api/gitlab-client.js";
import { LocalMirrorStore } from "./sync/mirror.js";
import { syncStars, type SyncStarsDeps } from "./orchestration/sync-stars.js";
import { loadConfig, type SyncConfig } from "./config.js";
import type { SyncSummary } from "./types.js";

export function createDeps(config: SyncConfig): SyncStarsDeps {
  return {
    source: new GitHubClient({ token: config.githubToken }),
    destination: new GitLabClient({
      baseUrl: config.gitlabUrl,
      token: config.gitlabToken,
      group: config.gitlabGroup,
      pushProtocol: config.pushProtocol,
    }),
    mirrors: new LocalMirrorStore({
      root: config.mirrorRoot,
      retries: config.gitRetries,
    }),
  };
}

// Set output for GitHub Actions
export async function writeOutputs(summary: SyncSummary, outputPath: string): Promise<void> {
  await appendFile(outputPath, `total=${summary.total}\n`);
  await appendFile(outputPath, `succeeded=${summary.succeeded}\n`);
  await appendFile(outputPath, `failed=${summary.failed.length}\n`);
}

export async function main(
  env: NodeJS.ProcessEnv = process.env,
  makeDeps: (config: SyncConfig) => SyncStarsDeps = createDeps
): Promise<SyncSummary> {
  const configPath = env.CONFIG_PATH ?? "./config/sync-config.json";
  const config = await loadConfig(configPath, env);

  const summary = await syncStars(
    { githubUsers: config.githubUsers, threads: config.threads },
    makeDeps(config)
  );

  console.log("\n" + "=".repeat(60));
  console.log("Sync Summary");
  console.log("=".repeat(60));
  console.log(`Total processed: ${summary.total}`);
  console.log(`Successful: ${summary.succeeded}`);
  console.log(`Failed: ${summary.failed.length}`);

  if (summary.failed.length > 0) {
    console.log("\nFailed repos:");
    for (const name of summary.failed) {
      console.log(`  - ${name}`);
    }
  }

  if (env.GITHUB_OUTPUT) {
    await writeOutputs(summary, env.GITHUB_OUTPUT);
  }

  return summary;
}

/**
 * Exit code for a run: 0 once every task has been attempted, whatever the
 * failures, 1 when the run stopped early.
 */
export async function runCli(
  env: NodeJS.ProcessEnv = process.env,
  makeDeps: (config: SyncConfig) => SyncStarsDeps = createDeps
): Promise<number> {
  try {
    await main(env, makeDeps);
    return 0;
  } catch (error) {
    console.error("Fatal error:", error);
    return 1;
  }
}

// Run if called directly
const isMainModule = process.argv[1] === fileURLToPath(import.meta.url);
if (isMainModule) {
  process.exitCode = await runCli();
}
