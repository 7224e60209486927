import { promises as fs } from "node:fs";
import path from "node:path";
import { PathHelper } from "@reqforge/shared";

export const splitLines = (content: string): string[] => {
  const lines = content.split(/\r?\n/);
  if (lines.length > 1 && lines[lines.length - 1] === "") lines.pop();
  return lines;
};

export const joinLines = (lines: readonly string[]): string => `${lines.join("\n")}\n`;

export interface WriteResult {
  path: string;
  backupPath?: string;
}

/** Reads and writes one document file, keeping a timestamped backup of what it replaces. */
export class DocumentStore {
  constructor(
    private readonly workspaceRoot: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  resolve(docPath: string): string {
    return path.resolve(this.workspaceRoot, docPath);
  }

  async exists(docPath: string): Promise<boolean> {
    try {
      await fs.access(this.resolve(docPath));
      return true;
    } catch {
      return false;
    }
  }

  async read(docPath: string): Promise<string[]> {
    return splitLines(await fs.readFile(this.resolve(docPath), "utf8"));
  }

  async backup(docPath: string): Promise<string | undefined> {
    if (!(await this.exists(docPath))) return undefined;
    const backupsDir = PathHelper.getBackupsDir(this.workspaceRoot);
    await PathHelper.ensureDir(backupsDir);
    const stamp = this.now().toISOString().replace(/[:.]/g, "-");
    const backupPath = path.join(backupsDir, `${path.basename(docPath)}.${stamp}.bak`);
    await fs.copyFile(this.resolve(docPath), backupPath);
    return backupPath;
  }

  async write(docPath: string, lines: readonly string[], options: { backup?: boolean } = {}): Promise<WriteResult> {
    const target = this.resolve(docPath);
    const backupPath = options.backup === false ? undefined : await this.backup(docPath);
    await PathHelper.ensureDir(path.dirname(target));
    await fs.writeFile(target, joinLines(lines), "utf8");
    return { path: target, backupPath };
  }
}
