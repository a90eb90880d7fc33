import fs from "fs/promises";
import path from "path";

function isMissing(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

let tmpCounter = 0;

/** Plain-file access under the data folder. Writes are atomic (temp file + rename). */
export class FileStore {
  async ensureFolder(folderPath: string): Promise<void> {
    await fs.mkdir(folderPath, { recursive: true });
  }

  async ensureFolderForFile(filePath: string): Promise<void> {
    await this.ensureFolder(path.dirname(filePath));
  }

  async writeFile(filePath: string, content: string): Promise<void> {
    await this.ensureFolderForFile(filePath);
    const tmp = `${filePath}.${process.pid}.${++tmpCounter}.tmp`;
    await fs.writeFile(tmp, content, "utf-8");
    try {
      await fs.rename(tmp, filePath);
    } catch (err) {
      await fs.rm(tmp, { force: true });
      throw err;
    }
  }

  /** File contents, or null when the file does not exist. */
  async readFile(filePath: string): Promise<string | null> {
    try {
      return await fs.readFile(filePath, "utf-8");
    } catch (err) {
      if (isMissing(err)) return null;
      throw err;
    }
  }

  /**
   * Append content to a log file, then rotate if the file exceeds maxBytes.
   * When rotating, the oldest half is discarded so the file stays near maxBytes/2.
   */
  async appendLogWithRotation(filePath: string, content: string, maxBytes: number): Promise<void> {
    const current = (await this.readFile(filePath)) ?? "";
    let next = current + content;

    if (Buffer.byteLength(next, "utf-8") > maxBytes) {
      // Keep the last half, aligned to a newline boundary
      const keepFrom = next.length - Math.floor(maxBytes / 2);
      const newlineIdx = next.indexOf("\n", keepFrom);
      const tail = newlineIdx !== -1 ? next.slice(newlineIdx + 1) : next.slice(keepFrom);
      const keptKB = Math.round(tail.length / 1024);
      next = `[LOG ROTATED ${new Date().toISOString()} - older entries removed, kept last ~${keptKB}KB]\n` + tail;
    }

    await this.writeFile(filePath, next);
  }

  async fileExists(filePath: string): Promise<boolean> {
    try {
      const stat = await fs.stat(filePath);
      return stat.isFile();
    } catch (err) {
      if (isMissing(err)) return false;
      throw err;
    }
  }

  /** Names of the regular files directly inside `folderPath`. */
  async listFolder(folderPath: string): Promise<string[]> {
    try {
      const entries = await fs.readdir(folderPath, { withFileTypes: true });
      return entries.filter(e => e.isFile()).map(e => e.name);
    } catch (err) {
      if (isMissing(err)) return [];
      throw err;
    }
  }
}
