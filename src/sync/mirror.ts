import { simpleGit, SimpleGit } from "simple-git";
import { mkdir } from "fs/promises";
import { existsSync } from "fs";
import { join } from "path";
import pRetry from "p-retry";
import { GitCommandError } from "../errors.js";
import type { MirrorStore } from "../types.js";

export interface LocalMirrorOptions {
  root: string;
  retries?: number;
}

// Bare clones carry no fetch refspec, so name the refs to advance explicitly.
const FETCH_REFSPECS = ["+refs/heads/*:refs/heads/*", "+refs/tags/*:refs/tags/*"];

function redact(url: string): string {
  return url.replace(/:[^@/]+@/, ":***@");
}

export class LocalMirrorStore implements MirrorStore {
  private root: string;
  private retries: number;

  constructor(options: LocalMirrorOptions) {
    this.root = options.root;
    this.retries = options.retries ?? 0;
  }

  pathFor(name: string): string {
    return join(this.root, name);
  }

  exists(name: string): boolean {
    return existsSync(join(this.pathFor(name), "HEAD"));
  }

  private git(baseDir?: string): SimpleGit {
    return baseDir ? simpleGit(baseDir) : simpleGit();
  }

  private async run(command: string, action: () => Promise<unknown>): Promise<void> {
    try {
      await pRetry(action, {
        retries: this.retries,
        onFailedAttempt: (error) => {
          if (error.retriesLeft > 0) {
            console.warn(`git ${command} attempt ${error.attemptNumber} failed: ${error.message}`);
          }
        },
      });
    } catch (error) {
      throw new GitCommandError(command, error);
    }
  }

  /**
   * Fetches into an existing bare mirror, or bare-clones the source when
   * the mirror has not been created yet.
   */
  async update(name: string, cloneUrl: string): Promise<void> {
    const path = this.pathFor(name);

    if (this.exists(name)) {
      console.log(`Fetching ${cloneUrl} into ${path}`);
      const git = this.git(path);
      await this.run("fetch", () => git.fetch(["--prune", "origin", ...FETCH_REFSPECS]));
      return;
    }

    console.log(`Creating local repo at ${path}`);
    await mkdir(path, { recursive: true });
    console.log(`Cloning ${cloneUrl}`);
    const git = this.git();
    await this.run("clone", () => git.clone(cloneUrl, path, ["--bare"]));
  }

  async push(name: string, targetUrl: string): Promise<void> {
    const git = this.git(this.pathFor(name));

    console.log(`Pushing ${name} to ${redact(targetUrl)}`);
    await this.run("push --all", () => git.push(["--all", targetUrl]));
    await this.run("push --tags", () => git.push(["--tags", targetUrl]));
  }
}
