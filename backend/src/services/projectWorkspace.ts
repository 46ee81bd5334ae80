import path from "node:path";
import { CodebaseIndexService } from "./codebaseIndexService.js";
import { FileSystemService } from "./fileSystemService.js";

export type ProjectWorkspace = {
  files: FileSystemService;
  index: CodebaseIndexService;
};

/** One file service and one symbol index per project root, shared by sessions. */
export class ProjectWorkspaceRegistry {
  private readonly workspaces = new Map<string, ProjectWorkspace>();

  get(projectRoot: string): ProjectWorkspace {
    const root = path.resolve(projectRoot);
    let workspace = this.workspaces.get(root);
    if (!workspace) {
      const files = new FileSystemService(root);
      workspace = { files, index: new CodebaseIndexService(files) };
      this.workspaces.set(root, workspace);
    }
    return workspace;
  }
}
