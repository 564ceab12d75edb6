// Which processes each component's collector looks for.

import type { Component } from "../capture/types.js";
import type { ProcessInfo } from "./process_table.js";

export interface ProcessMatcher {
  readonly component: Component;
  readonly sourceLabel: string;
  matches(process: ProcessInfo): boolean;
}

const LOCAL_MODEL_PATTERNS = ["ollama", "llama", "gpt4all", "localai"] as const;

const SHELLS: ReadonlySet<string> = new Set(["bash", "zsh", "fish", "sh"]);

/** Terminals idle below this CPU share are not counted. */
export const ACTIVE_TERMINAL_CPU_PERCENT = 0.1;

export const EDITOR_MATCHER: ProcessMatcher = {
  component: "editor",
  sourceLabel: "editor_process_scan",
  matches: ({ name }) => name === "code" || name.includes("code-server") || name === "code.exe",
};

export const EXTENSION_MATCHER: ProcessMatcher = {
  component: "extension",
  sourceLabel: "extension_host_scan",
  matches: ({ name, command }) => name.includes("extensionhost") || command.includes("extensionHost"),
};

export const TERMINAL_MATCHER: ProcessMatcher = {
  component: "terminal",
  sourceLabel: "terminal_process_scan",
  matches: ({ name, cpu_percent }) =>
    cpu_percent > ACTIVE_TERMINAL_CPU_PERCENT &&
    (SHELLS.has(name) || name.includes("terminal") || name.includes("konsole")),
};

export const ASSISTANT_MATCHER: ProcessMatcher = {
  component: "assistant",
  sourceLabel: "assistant_process_scan",
  matches: ({ name, command }) => {
    const cmd = command.toLowerCase();
    return name.includes("copilot") || cmd.includes("github.copilot") || cmd.includes("copilot-agent");
  },
};

export const LOCAL_MODEL_MATCHER: ProcessMatcher = {
  component: "local_model",
  sourceLabel: "local_model_process_scan",
  matches: ({ command }) => {
    const cmd = command.toLowerCase();
    return LOCAL_MODEL_PATTERNS.some((pattern) => cmd.includes(pattern));
  },
};

/** Scanned every interval. */
export const WORKSPACE_MATCHERS: readonly ProcessMatcher[] = [EDITOR_MATCHER, EXTENSION_MATCHER, TERMINAL_MATCHER];

/** Scanned every other interval. */
export const MODEL_MATCHERS: readonly ProcessMatcher[] = [ASSISTANT_MATCHER, LOCAL_MODEL_MATCHER];
