import path from "node:path";
import { promises as fs } from "node:fs";

/**
 * Resolves reqforge workspace paths relative to the document's working directory.
 */
export class PathHelper {
  static getWorkspaceDir(cwd: string = process.cwd()): string {
    return path.join(cwd, ".reqforge");
  }

  static getWorkspaceConfigPath(cwd: string = process.cwd()): string {
    return path.join(this.getWorkspaceDir(cwd), "config.yaml");
  }

  static getLogsDir(cwd: string = process.cwd()): string {
    return path.join(this.getWorkspaceDir(cwd), "logs");
  }

  static getBackupsDir(cwd: string = process.cwd()): string {
    return path.join(this.getWorkspaceDir(cwd), "backups");
  }

  static async ensureDir(dir: string): Promise<void> {
    await fs.mkdir(dir, { recursive: true });
  }
}
