import { spawn } from "node:child_process";

export type CommandResult = { stdout: string; stderr: string; exitCode: number };

export type RunOptions = {
  /** Stream output to the terminal instead of capturing it (installers, model pulls). */
  inherit?: boolean;
  cwd?: string;
};

export interface CommandRunner {
  /** Never rejects: a command that cannot be spawned resolves with exitCode -1. */
  run(command: string, args: string[], options?: RunOptions): Promise<CommandResult>;
  /** Start a background process that outlives this one. Resolves once it has spawned. */
  spawnDetached(command: string, args: string[]): Promise<void>;
  /** Is `command` on PATH? */
  which(command: string): Promise<boolean>;
}

/** Quote a single argument for sh (single-quoted literal, internal quotes escaped). */
export function shellQuote(arg: string): string {
  if (/^[\w@%+=:,./-]+$/.test(arg)) return arg;
  return "'" + arg.replace(/'/g, "'\\''") + "'";
}

export function formatCommand(command: string, args: string[]): string {
  return [command, ...args].map(shellQuote).join(" ");
}

export const createCommandRunner = (): CommandRunner => {
  const run = (command: string, args: string[], options: RunOptions = {}): Promise<CommandResult> =>
    new Promise((resolve) => {
      const proc = spawn(command, args, {
        cwd: options.cwd,
        stdio: options.inherit ? ["inherit", "inherit", "inherit"] : ["ignore", "pipe", "pipe"],
      });
      let stdout = "";
      let stderr = "";
      proc.stdout?.on("data", (d: Buffer) => { stdout += d.toString(); });
      proc.stderr?.on("data", (d: Buffer) => { stderr += d.toString(); });
      proc.on("close", (code) => resolve({ stdout, stderr, exitCode: code ?? -1 }));
      proc.on("error", (err) => resolve({ stdout, stderr: stderr || err.message, exitCode: -1 }));
    });

  return {
    run,
    spawnDetached: (command, args) =>
      new Promise((resolve, reject) => {
        const child = spawn(command, args, { stdio: "ignore", detached: true, env: { ...process.env } });
        child.once("error", reject);
        child.once("spawn", () => {
          child.unref();
          resolve();
        });
      }),
    which: async (command) => {
      const out = await run("sh", ["-c", 'command -v "$1"', "sh", command]);
      return out.exitCode === 0 && out.stdout.trim() !== "";
    },
  };
};
