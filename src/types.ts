export interface RepoRecord {
  name: string;
  cloneUrl: string;
  description: string | null;
  id: number;
}

export interface SyncTask {
  source: RepoRecord;
  destination: RepoRecord | null;
  namespaceId: number;
  mappedName: string;
}

export interface SyncSummary {
  total: number;
  succeeded: number;
  failed: string[];
}

export interface StarSource {
  listStars(accounts: string[]): Promise<RepoRecord[]>;
}

export interface Destination {
  listRepos(): Promise<RepoRecord[]>;
  getGroupNamespaceId(): Promise<number>;
  createRepo(namespaceId: number, name: string): Promise<RepoRecord>;
  setDescription(repoId: number, description: string | null): Promise<void>;
}

export interface MirrorStore {
  update(name: string, cloneUrl: string): Promise<void>;
  push(name: string, targetUrl: string): Promise<void>;
}
