import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { syncRepo } from "../../src/sync/repo-syncer.js";
import { ApiError, GitCommandError } from "../../src/errors.js";
import type { SyncTask } from "../../src/types.js";
import {
  destinationRecord,
  fakeDestination,
  fakeMirrors,
  silenceConsole,
  sourceRecord,
} from "../helpers.js";

describe("syncRepo", () => {
  let destination: ReturnType<typeof fakeDestination>;
  let mirrors: ReturnType<typeof fakeMirrors>;

  function task(overrides: Partial<SyncTask> = {}): SyncTask {
    return {
      source: sourceRecord("owner/project", "A project"),
      destination: destinationRecord("owner__project", 7, "A project"),
      namespaceId: 42,
      mappedName: "owner__project",
      ...overrides,
    };
  }

  beforeEach(() => {
    silenceConsole();
    destination = fakeDestination();
    mirrors = fakeMirrors();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("creates a missing destination and pushes to its remote", async () => {
    const created = destinationRecord("owner__project", 11, null);
    destination.createRepo.mockResolvedValueOnce(created);

    const ok = await syncRepo(task({ destination: null }), { destination, mirrors });

    expect(ok).toBe(true);
    expect(destination.createRepo).toHaveBeenCalledWith(42, "owner__project");
    expect(destination.setDescription).toHaveBeenCalledWith(11, "A project");
    expect(mirrors.update).toHaveBeenCalledWith(
      "owner__project",
      "https://github.com/owner/project.git"
    );
    expect(mirrors.push).toHaveBeenCalledWith("owner__project", created.cloneUrl);
  });

  it("updates an empty destination description exactly once", async () => {
    const ok = await syncRepo(
      task({ destination: destinationRecord("owner__project", 7, "") }),
      { destination, mirrors }
    );

    expect(ok).toBe(true);
    expect(destination.setDescription).toHaveBeenCalledTimes(1);
    expect(destination.setDescription).toHaveBeenCalledWith(7, "A project");
  });

  it("treats an absent source description and an empty one as different", async () => {
    await syncRepo(
      task({
        source: sourceRecord("owner/project", null),
        destination: destinationRecord("owner__project", 7, ""),
      }),
      { destination, mirrors }
    );

    expect(destination.setDescription).toHaveBeenCalledWith(7, null);
  });

  it("makes no API calls when re-syncing a matching destination", async () => {
    const unchanged = task();

    await syncRepo(unchanged, { destination, mirrors });
    await syncRepo(unchanged, { destination, mirrors });

    expect(destination.createRepo).not.toHaveBeenCalled();
    expect(destination.setDescription).not.toHaveBeenCalled();
    expect(mirrors.update).toHaveBeenCalledTimes(2);
    expect(mirrors.push).toHaveBeenCalledTimes(2);
  });

  it("reports failure and skips the mirror when creation fails", async () => {
    destination.createRepo.mockRejectedValueOnce(
      new ApiError("GitLab API error: 400 Bad Request", "gitlab", 400)
    );

    const ok = await syncRepo(task({ destination: null }), { destination, mirrors });

    expect(ok).toBe(false);
    expect(destination.setDescription).not.toHaveBeenCalled();
    expect(mirrors.update).not.toHaveBeenCalled();
  });

  it("reports failure without pushing when the fetch fails", async () => {
    mirrors.update.mockRejectedValueOnce(
      new GitCommandError("fetch", new Error("exit code 128"))
    );

    const ok = await syncRepo(task(), { destination, mirrors });

    expect(ok).toBe(false);
    expect(mirrors.push).not.toHaveBeenCalled();
    expect(console.error).toHaveBeenCalledWith(
      "Failed to sync owner/project: git fetch failed: exit code 128"
    );
  });
});
