import { spawn } from "child_process";

// Runs `command` through the shell with the terminal handed straight to it.
export function runShellCommand(command: string) {
  return new Promise<void>((resolve, reject) => {
    const child = spawn(command, { stdio: "inherit", shell: true });
    child.on("close", (code) => {
      if (code === 0) resolve();
      else reject(new Error(`${command} failed with exit code ${code}`));
    });
    child.on("error", (err) => reject(err));
  });
}
