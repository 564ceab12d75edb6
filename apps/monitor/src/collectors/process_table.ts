/**
 * Process table snapshots for the collectors.
 *
 * The default scanner shells out to `ps`, the way capability checks
 * shell out to system tools. Tests inject their own {@link ProcessScanner}.
 *
 * @module
 */

import { execFile } from "node:child_process";
import { basename } from "node:path";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

export interface ProcessInfo {
  readonly pid: number;
  /** Executable name, lowercased, without its directory. */
  readonly name: string;
  /** Full command line as reported by the OS. */
  readonly command: string;
  readonly cpu_percent: number;
}

export type ProcessScanner = () => Promise<ProcessInfo[]>;

const PS_LINE = /^\s*(\d+)\s+([\d.]+)\s+(.+)$/;

/** Parse `ps -eo pid=,pcpu=,args=` output. Lines that do not fit are skipped. */
export function parsePsOutput(text: string): ProcessInfo[] {
  const out: ProcessInfo[] = [];
  for (const line of text.split("\n")) {
    const match = PS_LINE.exec(line);
    const pid = match?.[1];
    const cpu = match?.[2];
    const command = match?.[3]?.trim();
    if (pid === undefined || cpu === undefined || command === undefined || command.length === 0) {
      continue;
    }
    const executable = command.split(/\s+/, 1)[0] ?? "";
    // Login shells show up as "-bash".
    const name = basename(executable.replace(/^-/, "")).toLowerCase();
    out.push({ pid: Number(pid), name, command, cpu_percent: Number(cpu) });
  }
  return out;
}

export const psScanner: ProcessScanner = async () => {
  const { stdout } = await execFileAsync("ps", ["-eo", "pid=,pcpu=,args="], {
    maxBuffer: 16 * 1024 * 1024,
  });
  return parsePsOutput(stdout);
};
