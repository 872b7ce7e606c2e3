import { errorMessage } from "../errors.js";
import type { Destination, MirrorStore, SyncTask } from "../types.js";

export interface RepoSyncDeps {
  destination: Destination;
  mirrors: MirrorStore;
}

/**
 * Brings one destination project in line with its source: create it if
 * missing, copy the description, refresh the local mirror and push
 * branches and tags. Failures are logged and reported as `false`.
 */
export async function syncRepo(task: SyncTask, deps: RepoSyncDeps): Promise<boolean> {
  const { source, namespaceId, mappedName } = task;
  const { destination, mirrors } = deps;

  try {
    console.log(`Syncing repo ${source.name}`);

    let target = task.destination;
    if (target === null) {
      target = await destination.createRepo(namespaceId, mappedName);
    }

    if (target.description !== source.description) {
      console.log(`Syncing description of ${source.name}`);
      await destination.setDescription(target.id, source.description);
    }

    await mirrors.update(mappedName, source.cloneUrl);
    await mirrors.push(mappedName, target.cloneUrl);

    console.log(`Synced ${source.name}`);
    return true;
  } catch (error) {
    console.error(`Failed to sync ${source.name}: ${errorMessage(error)}`);
    return false;
  }
}
