import { spawn } from "node:child_process";

export type CommandResult = {
  exitCode: number;
  /** stdout and stderr interleaved in arrival order. */
  output: string;
};

export type CommandExecutor = (
  command: string,
  args: string[],
  options?: { cwd?: string }
) => Promise<CommandResult>;

export function createProcessExecutor(env?: NodeJS.ProcessEnv): CommandExecutor {
  return (command, args, options) =>
    new Promise((resolve, reject) => {
      const child = spawn(command, args, {
        cwd: options?.cwd,
        env: { ...process.env, ...env },
        stdio: ["ignore", "pipe", "pipe"]
      });

      let output = "";
      const append = (chunk: string) => {
        output += chunk;
      };
      child.stdout.setEncoding("utf8");
      child.stdout.on("data", append);
      child.stderr.setEncoding("utf8");
      child.stderr.on("data", append);

      child.on("error", reject);
      child.on("close", (code, signal) => {
        resolve({
          exitCode: code ?? 1,
          output: signal ? `${output}\nterminated by ${signal}` : output
        });
      });
    });
}
