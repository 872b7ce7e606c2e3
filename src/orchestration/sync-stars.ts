import { mapName } from "../sync/name-mapper.js";
import { syncRepo } from "../sync/repo-syncer.js";
import type {
  Destination,
  MirrorStore,
  RepoRecord,
  StarSource,
  SyncSummary,
  SyncTask,
} from "../types.js";

export interface SyncStarsOptions {
  githubUsers: string[];
  threads: number;
}

export interface SyncStarsDeps {
  source: StarSource;
  destination: Destination;
  mirrors: MirrorStore;
}

export function buildTasks(
  stars: RepoRecord[],
  destinations: RepoRecord[],
  namespaceId: number
): SyncTask[] {
  const byName = new Map(destinations.map((repo) => [repo.name, repo]));

  return stars.map((source) => {
    const mappedName = mapName(source.name);
    return {
      source,
      destination: byName.get(mappedName) ?? null,
      namespaceId,
      mappedName,
    };
  });
}

/**
 * Runs `worker` over `items` with at most `size` calls in flight, handing
 * out one item at a time. Results keep the order of `items`.
 */
export async function runPool<T, R>(
  items: T[],
  size: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  async function drain(): Promise<void> {
    while (next < items.length) {
      const index = next++;
      results[index] = await worker(items[index], index);
    }
  }

  const slots = Math.max(1, Math.min(size, items.length));
  await Promise.all(Array.from({ length: slots }, () => drain()));
  return results;
}

export async function syncStars(
  options: SyncStarsOptions,
  deps: SyncStarsDeps
): Promise<SyncSummary> {
  const stars = await deps.source.listStars(options.githubUsers);
  const destinations = await deps.destination.listRepos();
  const namespaceId = await deps.destination.getGroupNamespaceId();

  const tasks = buildTasks(stars, destinations, namespaceId);
  console.log(`Dispatching ${tasks.length} repos to ${options.threads} workers`);

  const results = await runPool(tasks, options.threads, (task) =>
    syncRepo(task, { destination: deps.destination, mirrors: deps.mirrors })
  );

  const succeeded = results.filter(Boolean).length;
  const failed = tasks
    .filter((_, index) => !results[index])
    .map((task) => task.source.name);

  console.log(`Succeeded: ${succeeded}/${results.length}`);
  if (failed.length > 0) {
    console.log(`Failed repos: ${failed.join(", ")}`);
  }

  return { total: tasks.length, succeeded, failed };
}
