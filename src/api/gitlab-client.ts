import { z } from "zod";
import { ApiError } from "../errors.js";
import type { Destination, RepoRecord } from "../types.js";

export const GitLabProjectSchema = z.object({
  id: z.number(),
  path: z.string(),
  description: z.string().nullable().default(null),
  ssh_url_to_repo: z.string(),
  http_url_to_repo: z.string(),
});

export const GitLabGroupSchema = z.object({
  id: z.number(),
});

export type GitLabProject = z.infer<typeof GitLabProjectSchema>;

export interface GitLabClientOptions {
  baseUrl: string;
  token: string;
  group: string;
  pushProtocol?: "ssh" | "https";
  perPage?: number;
}

type FormFields = Record<string, string>;

/**
 * HTTPS remotes carry the token as basic-auth password, the way GitLab
 * accepts personal access tokens for git over HTTP.
 */
export function injectToken(url: string, token: string): string {
  if (!url.startsWith("https://") && !url.startsWith("http://")) return url;

  const urlObj = new URL(url);
  urlObj.username = "oauth2";
  urlObj.password = token;
  return urlObj.toString();
}

export class GitLabClient implements Destination {
  private token: string;
  private group: string;
  private apiUrl: string;
  private pushProtocol: "ssh" | "https";
  private perPage: number;

  constructor(options: GitLabClientOptions) {
    this.token = options.token;
    this.group = options.group;
    this.apiUrl = `${options.baseUrl.replace(/\/+$/, "")}/api/v4`;
    this.pushProtocol = options.pushProtocol ?? "ssh";
    this.perPage = options.perPage ?? 100;
  }

  private async request(
    method: string,
    path: string,
    form?: FormFields
  ): Promise<unknown> {
    const url = `${this.apiUrl}${path}`;

    const response = await fetch(url, {
      method,
      headers: {
        "Private-Token": this.token,
        Accept: "application/json",
      },
      body: form ? new URLSearchParams(form) : undefined,
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new ApiError(
        `GitLab API error: ${response.status} ${response.statusText} - ${errorText}`,
        "gitlab",
        response.status,
        errorText
      );
    }

    const text = await response.text();
    return text ? JSON.parse(text) : {};
  }

  private parse<S extends z.ZodTypeAny>(schema: S, body: unknown, what: string): z.infer<S> {
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new ApiError(
        `Unexpected GitLab response for ${what}: ${parsed.error.message}`,
        "gitlab"
      );
    }
    return parsed.data;
  }

  private toRecord(project: GitLabProject): RepoRecord {
    return {
      name: project.path,
      cloneUrl:
        this.pushProtocol === "https"
          ? injectToken(project.http_url_to_repo, this.token)
          : project.ssh_url_to_repo,
      description: project.description,
      id: project.id,
    };
  }

  private get groupPath(): string {
    return `/groups/${encodeURIComponent(this.group)}`;
  }

  async getGroupNamespaceId(): Promise<number> {
    const body = await this.request("GET", this.groupPath);
    const { id } = this.parse(GitLabGroupSchema, body, `group ${this.group}`);
    console.log(`GitLab group namespace: ${id}`);
    return id;
  }

  async listRepos(): Promise<RepoRecord[]> {
    const repos: RepoRecord[] = [];

    console.log(`Loading GitLab repos of group ${this.group}`);

    for (let page = 1; ; page++) {
      console.log(`Requesting projects page ${page}`);
      const query = new URLSearchParams({
        per_page: String(this.perPage),
        page: String(page),
      });
      const body = await this.request("GET", `${this.groupPath}/projects?${query}`);
      const projects = this.parse(z.array(GitLabProjectSchema), body, "project list");

      console.log(`Got ${projects.length} repos`);
      if (projects.length === 0) {
        break;
      }
      repos.push(...projects.map((project) => this.toRecord(project)));
    }

    console.log(`Total repos: ${repos.length}`);
    return repos;
  }

  async createRepo(namespaceId: number, name: string): Promise<RepoRecord> {
    console.log(`Creating GitLab repo ${name}`);
    const body = await this.request("POST", "/projects", {
      path: name,
      namespace_id: String(namespaceId),
    });
    return this.toRecord(this.parse(GitLabProjectSchema, body, `new project ${name}`));
  }

  async setDescription(repoId: number, description: string | null): Promise<void> {
    await this.request("PUT", `/projects/${repoId}`, {
      description: description ?? "",
    });
  }
}
