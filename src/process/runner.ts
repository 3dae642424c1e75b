import { spawn } from "node:child_process";

export interface CommandResult {
  ok: boolean;
  exitCode: number;
  stdout: string;
  stderr: string;
}

export const tailText = (value: string, maxChars: number): string => {
  const text = String(value || "");
  if (text.length <= maxChars) {
    return text;
  }
  return text.slice(text.length - maxChars);
};

export const runCommand = async (
  command: string,
  args: string[],
  options?: { cwd?: string; env?: Record<string, string | undefined> },
): Promise<CommandResult> => {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const exitCode = await new Promise<number>((resolve) => {
    const child = spawn(command, args, {
      cwd: options?.cwd,
      env: options?.env ? { ...process.env, ...options.env } : process.env,
      shell: false,
      stdio: ["ignore", "pipe", "pipe"],
    });
    child.stdout.on("data", (chunk: Buffer | string) => {
      stdout.push(chunk.toString());
    });
    child.stderr.on("data", (chunk: Buffer | string) => {
      stderr.push(chunk.toString());
    });
    child.on("close", (code) => {
      resolve(typeof code === "number" ? code : 1);
    });
    child.on("error", (error) => {
      stderr.push(error.message);
      resolve(127);
    });
  });
  return {
    ok: exitCode === 0,
    exitCode,
    stdout: stdout.join(""),
    stderr: stderr.join(""),
  };
};
