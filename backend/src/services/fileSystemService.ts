import { promises as fs } from "node:fs";
import path from "node:path";

const DEFAULT_IGNORED_DIRECTORIES = ["node_modules"];
const PACKAGE_BUNDLE_EXTENSIONS = [".app", ".bundle", ".framework", ".xcodeproj", ".xcworkspace", ".playground"];

export type ListFilesOptions = {
  limit?: number;
  ignoredDirectories?: string[];
};

function isPackageBundle(name: string): boolean {
  const lower = name.toLowerCase();
  return PACKAGE_BUNDLE_EXTENSIONS.some((extension) => lower.endsWith(extension));
}

function toPosixPath(value: string): string {
  return value.split(path.sep).join("/");
}

export function isMissingFileError(error: unknown): boolean {
  const code = (error as { code?: string }).code;
  return code === "ENOENT" || code === "ENOTDIR";
}

export class FileSystemService {
  private readonly root: string;

  constructor(projectRoot: string) {
    this.root = path.resolve(projectRoot);
  }

  get projectRoot(): string {
    return this.root;
  }

  resolvePath(relativePath: string): string {
    const resolved = path.resolve(this.root, relativePath);
    const relative = path.relative(this.root, resolved);
    if (relative === ".." || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
      throw new Error(`Path "${relativePath}" is outside the project root.`);
    }
    return resolved;
  }

  async readText(relativePath: string): Promise<string> {
    return fs.readFile(this.resolvePath(relativePath), "utf8");
  }

  async exists(relativePath: string): Promise<boolean> {
    try {
      const stat = await fs.stat(this.resolvePath(relativePath));
      return stat.isFile();
    } catch (error) {
      if (isMissingFileError(error)) {
        return false;
      }
      throw error;
    }
  }

  async writeText(relativePath: string, content: string): Promise<void> {
    const target = this.resolvePath(relativePath);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content, "utf8");
  }

  /**
   * Depth-first listing of regular files under `relativeDir`, in name order.
   * Hidden entries, package bundles and ignored directories are skipped.
   * Returned paths are relative to the project root and use `/`.
   */
  async listFiles(relativeDir = "", options: ListFilesOptions = {}): Promise<string[]> {
    const limit = options.limit ?? 20;
    const ignored = new Set(options.ignoredDirectories ?? DEFAULT_IGNORED_DIRECTORIES);
    const files: string[] = [];

    const walk = async (directory: string): Promise<void> => {
      const entries = await fs.readdir(directory, { withFileTypes: true });
      entries.sort((left, right) => left.name.localeCompare(right.name));

      for (const entry of entries) {
        if (files.length >= limit) {
          return;
        }
        if (entry.name.startsWith(".")) {
          continue;
        }

        const fullPath = path.join(directory, entry.name);
        if (entry.isDirectory()) {
          if (ignored.has(entry.name) || isPackageBundle(entry.name)) {
            continue;
          }
          await walk(fullPath);
        } else if (entry.isFile()) {
          files.push(toPosixPath(path.relative(this.root, fullPath)));
        }
      }
    };

    await walk(this.resolvePath(relativeDir));
    return files;
  }
}
