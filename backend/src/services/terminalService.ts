import { spawn, type ChildProcess } from "node:child_process";
import { createLogger } from "../logger.js";

const log = createLogger("Terminal");

const LONG_RUNNING_PATTERNS = [/http\.server/, /npm start/, /npm run dev/, /\bserve\b/, /\bwatch\b/, /flask run/];

export const LONG_RUNNING_DELAY_MS = 2000;

export type ExecuteOptions = {
  cwd?: string;
  env?: Record<string, string>;
  onOutput: (chunk: string) => void;
  onError: (chunk: string) => void;
  onComplete: (exitCode: number) => void;
  /** Fires once when a server or watcher command is still alive after the delay. */
  onLongRunning?: () => void;
};

export type ExecutionHandle = {
  cancel: () => void;
};

export interface CommandRunner {
  execute(command: string, options: ExecuteOptions): ExecutionHandle;
  cancelCurrent(): boolean;
}

export function isLongRunningCommand(command: string): boolean {
  const lowered = command.toLowerCase();
  return LONG_RUNNING_PATTERNS.some((pattern) => pattern.test(lowered));
}

/**
 * Runs one shell command at a time. Output is streamed through the callbacks
 * as it arrives; `onComplete` fires exactly once, with -1 when the process
 * could not be started. A server or watcher still running after
 * `longRunningDelayMs` is marked long-running and keeps the slot until it
 * exits or is cancelled.
 */
export class TerminalExecutionService implements CommandRunner {
  private current: ChildProcess | null = null;
  private longRunning = false;

  constructor(private readonly longRunningDelayMs = LONG_RUNNING_DELAY_MS) {}

  get isExecuting(): boolean {
    return this.current !== null;
  }

  get isLongRunning(): boolean {
    return this.longRunning;
  }

  cancelCurrent(): boolean {
    if (!this.current) {
      return false;
    }
    this.current.kill();
    return true;
  }

  execute(command: string, options: ExecuteOptions): ExecutionHandle {
    if (this.current) {
      options.onError("Blocked: Another process is already running.");
      options.onComplete(-1);
      return { cancel: () => undefined };
    }

    const child = spawn(command, {
      cwd: options.cwd,
      env: { ...process.env, ...options.env },
      shell: true
    });
    this.current = child;

    let completed = false;
    let longRunningTimer: NodeJS.Timeout | undefined;
    const finish = (exitCode: number): void => {
      if (completed) {
        return;
      }
      completed = true;
      clearTimeout(longRunningTimer);
      if (this.current === child) {
        this.current = null;
        this.longRunning = false;
      }
      log.debug(`Command finished with exit code ${exitCode}: ${command}`);
      options.onComplete(exitCode);
    };

    child.stdout?.setEncoding("utf8");
    child.stderr?.setEncoding("utf8");
    child.stdout?.on("data", (chunk: string) => options.onOutput(chunk));
    child.stderr?.on("data", (chunk: string) => options.onError(chunk));
    child.on("error", (error) => {
      options.onError(`Launch Failed: ${error.message}`);
      finish(-1);
    });
    child.on("close", (code) => finish(code ?? -1));

    if (isLongRunningCommand(command)) {
      longRunningTimer = setTimeout(() => {
        if (completed) {
          return;
        }
        this.longRunning = true;
        log.info(`Command is long-running: ${command}`);
        options.onLongRunning?.();
      }, this.longRunningDelayMs);
    }

    return {
      cancel: () => {
        if (!completed) {
          child.kill();
        }
      }
    };
  }
}
