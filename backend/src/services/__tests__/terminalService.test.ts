import { isLongRunningCommand, TerminalExecutionService } from "../terminalService.js";

describe("isLongRunningCommand", () => {
  test("flags servers and watchers", () => {
    expect(isLongRunningCommand("python -m http.server")).toBe(true);
    expect(isLongRunningCommand("NPM RUN DEV")).toBe(true);
    expect(isLongRunningCommand("tsc --watch")).toBe(true);
    expect(isLongRunningCommand("ls -la")).toBe(false);
  });
});

describe("TerminalExecutionService", () => {
  test("streams output and reports the exit code", async () => {
    const terminal = new TerminalExecutionService();
    let output = "";

    const exitCode = await new Promise<number>((resolve) => {
      terminal.execute("echo hello", {
        onOutput: (chunk) => {
          output += chunk;
        },
        onError: () => undefined,
        onComplete: resolve
      });
    });

    expect(exitCode).toBe(0);
    expect(output.trim()).toBe("hello");
    expect(terminal.isExecuting).toBe(false);
  });

  test("blocks a second command while one is running", async () => {
    const terminal = new TerminalExecutionService();
    const errors: string[] = [];
    const first = new Promise<number>((resolve) => {
      terminal.execute("echo first", { onOutput: () => undefined, onError: () => undefined, onComplete: resolve });
    });

    const blocked = await new Promise<number>((resolve) => {
      terminal.execute("echo second", {
        onOutput: () => undefined,
        onError: (chunk) => errors.push(chunk),
        onComplete: resolve
      });
    });

    expect(blocked).toBe(-1);
    expect(errors).toEqual(["Blocked: Another process is already running."]);
    expect(await first).toBe(0);
  });

  test("marks a watcher that outlives the delay and stops it on request", async () => {
    const terminal = new TerminalExecutionService(20);
    let reportExit: (exitCode: number) => void = () => undefined;
    const exited = new Promise<number>((resolve) => {
      reportExit = resolve;
    });

    await new Promise<void>((resolve) => {
      terminal.execute("exec sleep 5 # watch", {
        onOutput: () => undefined,
        onError: () => undefined,
        onComplete: (exitCode) => reportExit(exitCode),
        onLongRunning: resolve
      });
    });

    expect(terminal.isLongRunning).toBe(true);
    expect(terminal.isExecuting).toBe(true);
    expect(terminal.cancelCurrent()).toBe(true);
    expect(await exited).toBe(-1);
    expect(terminal.isLongRunning).toBe(false);
    expect(terminal.isExecuting).toBe(false);
  });

  test("never marks ordinary commands as long-running", async () => {
    const terminal = new TerminalExecutionService(0);
    const onLongRunning = jest.fn();

    await new Promise<number>((resolve) => {
      terminal.execute("echo hello", {
        onOutput: () => undefined,
        onError: () => undefined,
        onComplete: resolve,
        onLongRunning
      });
    });

    expect(onLongRunning).not.toHaveBeenCalled();
    expect(terminal.cancelCurrent()).toBe(false);
  });
});
