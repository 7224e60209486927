import { promises as fs } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { ConfigurationError } from "@reqforge/shared";

export const BASE_POLICY_PROFILE = "base_policy";
export const PROFILE_SEPARATOR = "\n\n---\n\n";

export const defaultProfilesDir = (): string => {
  const here = fileURLToPath(import.meta.url);
  return path.resolve(path.dirname(here), "../../../../profiles");
};

const isMissing = (error: unknown): boolean => error instanceof Error && "code" in error && error.code === "ENOENT";

/**
 * Reads markdown profiles by name from one directory. Every task profile is sent
 * behind the shared base policy.
 */
export class ProfileLoader {
  private readonly cache = new Map<string, string>();

  constructor(readonly profilesDir: string = defaultProfilesDir()) {}

  async load(name: string): Promise<string> {
    const cached = this.cache.get(name);
    if (cached !== undefined) return cached;
    if (!/^[a-z0-9_-]+$/i.test(name)) {
      throw new ConfigurationError(`Invalid profile name '${name}'`, { profile: name });
    }
    const profilePath = path.join(this.profilesDir, `${name}.md`);
    let content: string;
    try {
      content = await fs.readFile(profilePath, "utf8");
    } catch (error) {
      if (!isMissing(error)) throw error;
      const available = await this.listProfiles();
      throw new ConfigurationError(
        `Profile not found: ${profilePath}. Available profiles: ${available.join(", ") || "(none)"}`,
        { profile: name, profilesDir: this.profilesDir },
      );
    }
    this.cache.set(name, content);
    return content;
  }

  async buildFullProfile(taskProfile: string): Promise<string> {
    const base = await this.load(BASE_POLICY_PROFILE);
    const task = await this.load(taskProfile);
    return `${base.trim()}${PROFILE_SEPARATOR}${task.trim()}`;
  }

  async listProfiles(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.profilesDir);
    } catch (error) {
      if (isMissing(error)) return [];
      throw error;
    }
    return entries
      .filter((entry) => entry.endsWith(".md"))
      .map((entry) => entry.slice(0, -3))
      .filter((name) => name.toLowerCase() !== "readme")
      .sort();
  }

  clearCache(): void {
    this.cache.clear();
  }
}
