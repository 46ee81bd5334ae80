import { createApp } from "./app.js";
import { loadConfig } from "./config.js";
import { createLogger, setLogLevel } from "./logger.js";
import { createCompletionStreamer } from "./services/aiService.js";
import { loadSanitizerPolicy } from "./services/contentSanitizer.js";
import { NotepadService } from "./services/notepadService.js";
import { ProjectWorkspaceRegistry } from "./services/projectWorkspace.js";
import { TerminalExecutionService } from "./services/terminalService.js";
import { WebSearchService } from "./services/webSearchService.js";

const log = createLogger("Server");

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const app = createApp({
    defaultProjectRoot: config.projectRoot,
    providers: config.providers,
    workspaces: new ProjectWorkspaceRegistry(),
    notepads: await NotepadService.load(config.dataDir),
    web: new WebSearchService(),
    terminal: new TerminalExecutionService(),
    streamCompletion: createCompletionStreamer(config.providers),
    sanitizerPolicy: loadSanitizerPolicy(config.sanitizerPolicyFile)
  });

  app.listen(config.port, () => {
    log.info(`Backend listening on http://localhost:${config.port} (project root ${config.projectRoot})`);
  });
}

main().catch((error: unknown) => {
  log.error("Failed to start backend", error);
  process.exitCode = 1;
});
