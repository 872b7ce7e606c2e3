import { Octokit } from "@octokit/rest";
import { ApiError, errorMessage } from "../errors.js";
import type { RepoRecord, StarSource } from "../types.js";

export interface GitHubClientOptions {
  token?: string;
  perPage?: number;
}

function statusOf(error: unknown): number | undefined {
  if (error instanceof Error && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return undefined;
}

function recordKey(repo: RepoRecord): string {
  return JSON.stringify([repo.name, repo.cloneUrl, repo.description, repo.id]);
}

export class GitHubClient implements StarSource {
  private octokit: Octokit;
  private perPage: number;

  constructor(options: GitHubClientOptions = {}) {
    this.octokit = new Octokit({ auth: options.token });
    this.perPage = options.perPage ?? 100;
  }

  /**
   * Stars of every account, deduplicated by full record equality and sorted by name.
   * Any failed page aborts the whole listing.
   */
  async listStars(accounts: string[]): Promise<RepoRecord[]> {
    const unique = new Map<string, RepoRecord>();

    for (const account of accounts) {
      console.log(`Loading GitHub stars of ${account}`);
      for (const repo of await this.listStarsOf(account)) {
        unique.set(recordKey(repo), repo);
      }
    }

    const stars = [...unique.values()].sort((a, b) =>
      a.name < b.name ? -1 : a.name > b.name ? 1 : 0
    );
    console.log(`Total stars: ${stars.length}`);
    return stars;
  }

  private async fetchStarsPage(account: string, page: number) {
    try {
      const { data } = await this.octokit.activity.listReposStarredByUser({
        username: account,
        per_page: this.perPage,
        page,
      });
      return data;
    } catch (error) {
      throw new ApiError(
        `GitHub API error listing stars of ${account}: ${errorMessage(error)}`,
        "github",
        statusOf(error)
      );
    }
  }

  async listStarsOf(account: string): Promise<RepoRecord[]> {
    const stars: RepoRecord[] = [];

    for (let page = 1; ; page++) {
      console.log(`Requesting stars page ${page} of ${account}`);

      const data = await this.fetchStarsPage(account, page);
      console.log(`Got ${data.length} stars`);
      if (data.length === 0) {
        return stars;
      }

      for (const item of data) {
        const repo = "repo" in item ? item.repo : item;
        stars.push({
          name: repo.full_name,
          cloneUrl: repo.clone_url,
          description: repo.description,
          id: repo.id,
        });
      }
    }
  }
}
