import { readFile } from "fs/promises";
import { z } from "zod";
import { ConfigError, errorMessage } from "./errors.js";

export const SyncConfigFileSchema = z.object({
  githubUsers: z.array(z.string().min(1)).min(1),
  gitlabUrl: z.string().url(),
  gitlabGroup: z.string().min(1),
  threads: z.number().int().min(1).default(4),
  mirrorRoot: z.string().min(1).default("repos"),
  pushProtocol: z.enum(["ssh", "https"]).default("ssh"),
  gitRetries: z.number().int().min(0).default(0),
});

export type SyncConfigFile = z.infer<typeof SyncConfigFileSchema>;

export interface SyncConfig extends SyncConfigFile {
  gitlabToken: string;
  githubToken?: string;
}

export function parseConfig(
  raw: unknown,
  env: NodeJS.ProcessEnv = process.env
): SyncConfig {
  const parsed = SyncConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid config: ${issues}`);
  }

  const gitlabToken = env.GITLAB_TOKEN;
  if (!gitlabToken) {
    throw new ConfigError("Missing required environment variable GITLAB_TOKEN");
  }

  return {
    ...parsed.data,
    gitlabToken,
    githubToken: env.GH_TOKEN || undefined,
  };
}

export async function loadConfig(
  configPath: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<SyncConfig> {
  let content: string;
  try {
    content = await readFile(configPath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${configPath}: ${errorMessage(error)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new ConfigError(`Config file ${configPath} is not valid JSON`);
  }

  return parseConfig(raw, env);
}
