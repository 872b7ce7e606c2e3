/**
 * Shared fixtures for the unit tests.
 */

import { vi, type Mock } from "vitest";
import type { Destination, MirrorStore, RepoRecord } from "../src/types.js";

type FetchFn = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

export type FetchMock = Mock<FetchFn>;

export function stubFetch(): FetchMock {
  const fetchMock = vi.fn<FetchFn>();
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

export function requestUrl(fetchMock: FetchMock, call: number): URL {
  const input = fetchMock.mock.calls[call][0];
  return new URL(input instanceof Request ? input.url : input);
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json; charset=utf-8" },
  });
}

export function githubRepo(name: string, id: number, description: string | null = null) {
  return {
    id,
    full_name: name,
    clone_url: `https://github.com/${name}.git`,
    description,
  };
}

export function gitlabProject(path: string, id: number, description: string | null = null) {
  return {
    id,
    path,
    description,
    ssh_url_to_repo: `git@gitlab.example.com:stars/${path}.git`,
    http_url_to_repo: `https://gitlab.example.com/stars/${path}.git`,
  };
}

export function sourceRecord(name: string, description: string | null = null): RepoRecord {
  return {
    name,
    cloneUrl: `https://github.com/${name}.git`,
    description,
    id: 1000 + name.length,
  };
}

export function destinationRecord(
  name: string,
  id: number,
  description: string | null = null
): RepoRecord {
  return {
    name,
    cloneUrl: `git@gitlab.example.com:stars/${name}.git`,
    description,
    id,
  };
}

export function fakeDestination() {
  return {
    listRepos: vi.fn<Destination["listRepos"]>().mockResolvedValue([]),
    getGroupNamespaceId: vi.fn<Destination["getGroupNamespaceId"]>().mockResolvedValue(42),
    createRepo: vi.fn<Destination["createRepo"]>(),
    setDescription: vi.fn<Destination["setDescription"]>().mockResolvedValue(undefined),
  };
}

export function fakeMirrors() {
  return {
    update: vi.fn<MirrorStore["update"]>().mockResolvedValue(undefined),
    push: vi.fn<MirrorStore["push"]>().mockResolvedValue(undefined),
  };
}

export function silenceConsole(): void {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
}
