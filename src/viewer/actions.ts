import fs from "node:fs";
import path from "node:path";

import { getAppLogger } from "../logger.js";
import {
  ConfigurationError,
  RuntimeActionError,
  getErrorCode,
} from "./errors.js";

const log = getAppLogger("actions");

export type BindingOption = "act" | "move" | "movec" | "movesub";

export type Action =
  | { kind: "run"; template: string }
  | { kind: "move"; dir: string; create: boolean }
  | { kind: "movesub"; baseDir: string };

// Directories this action has already seen or created. One per bound key.
export type DirCache = { known: Set<string> };

export type BoundAction = {
  key: string;
  option: BindingOption;
  action: Action;
  state: DirCache;
};

/** Runs a shell command line; resolves true when it exits with status 0. */
export type CommandRunner = (command: string) => Promise<boolean>;

export type ActionEnv = {
  runCommand: CommandRunner;
};

/** Splits `K:PARAM`. The key is one character and the colon sits right after it. */
export function parseBinding(
  option: BindingOption,
  spec: string,
): { key: string; param: string } {
  if (spec.length < 3 || spec[1] !== ":") {
    throw new ConfigurationError(
      "InvalidBinding",
      `--${option}=${spec}: expected K:${option === "act" ? "COMMAND" : "DIR"}`,
      spec,
    );
  }
  return { key: spec[0], param: spec.slice(2) };
}

/** Puts `file` in place of the first `%s`; `%%` stands for a literal percent sign. */
export function formatCommand(template: string, file: string): string {
  let used = false;
  return template.replace(/%[%s]/g, (m) => {
    if (m === "%%") return "%";
    if (used) return m;
    used = true;
    return file;
  });
}

function hasPlaceholder(template: string): boolean {
  return template.replace(/%%/g, "").includes("%s");
}

function statOrNull(p: string): fs.Stats | null {
  try {
    return fs.statSync(p);
  } catch (err) {
    if (getErrorCode(err) === "ENOENT") return null;
    throw err;
  }
}

function actionFor(option: BindingOption, param: string): Action {
  switch (option) {
    case "act":
      return { kind: "run", template: param };
    case "move":
      return { kind: "move", dir: param, create: false };
    case "movec":
      return { kind: "move", dir: param, create: true };
    case "movesub":
      return { kind: "movesub", baseDir: param };
  }
}

/** Builds a bound action and checks its parameter before the session starts. */
export function createAction(option: BindingOption, spec: string): BoundAction {
  const { key, param } = parseBinding(option, spec);
  const action = actionFor(option, param);
  const state: DirCache = { known: new Set() };

  switch (action.kind) {
    case "run":
      if (!hasPlaceholder(action.template)) {
        throw new ConfigurationError(
          "InvalidBinding",
          `--${option}=${spec}: command has no %s for the file name`,
          spec,
        );
      }
      break;
    case "move": {
      const st = statOrNull(action.dir);
      if (st?.isDirectory()) {
        state.known.add(action.dir);
      } else if (st || !action.create) {
        throw new ConfigurationError(
          "NotADirectory",
          `--${option}=${spec}: ${action.dir} is not a directory`,
          action.dir,
        );
      }
      break;
    }
    case "movesub":
      if (!statOrNull(action.baseDir)?.isDirectory()) {
        throw new ConfigurationError(
          "NotADirectory",
          `--${option}=${spec}: ${action.baseDir} is not a directory`,
          action.baseDir,
        );
      }
      break;
  }

  return { key, option, action, state };
}

// Creates `dir` (parent must exist) unless this action already knows it is there.
function ensureDir(dir: string, cache: DirCache) {
  if (cache.known.has(dir)) return;
  const st = statOrNull(dir);
  if (st && !st.isDirectory()) {
    throw new Error(`${dir} exists but is not a directory`);
  }
  if (!st) {
    fs.mkdirSync(dir);
    log.debug("Created {dir}", { dir });
  }
  cache.known.add(dir);
}

function moveInto(file: string, dir: string): string {
  const dest = path.join(dir, path.basename(file));
  fs.renameSync(file, dest);
  return dest;
}

/**
 * Applies a bound action to the file on screen and returns a short status
 * message. Any failure comes back as a RuntimeActionError.
 */
export async function runAction(
  bound: BoundAction,
  file: string,
  env: ActionEnv,
): Promise<string> {
  const { action, state } = bound;
  try {
    switch (action.kind) {
      case "run": {
        const command = formatCommand(action.template, file);
        log.info("{command}", { command });
        const ok = await env.runCommand(command);
        if (!ok) log.warn("Command failed: {command}", { command });
        return `ran ${command}`;
      }
      case "move": {
        ensureDir(action.dir, state);
        const dest = moveInto(file, action.dir);
        log.info("Moved {file} to {dest}", { file, dest });
        return `moved to ${dest}`;
      }
      case "movesub": {
        const parent = path.basename(path.dirname(path.resolve(file)));
        const dir = path.join(action.baseDir, parent);
        ensureDir(dir, state);
        const dest = moveInto(file, dir);
        log.info("Moved {file} to {dest}", { file, dest });
        return `moved to ${dest}`;
      }
    }
  } catch (err) {
    throw new RuntimeActionError(action.kind, file, err);
  }
}

/** Key to bound action. Filled once from the command line. */
export class ActionRegistry {
  private readonly bindings = new Map<string, BoundAction>();

  bind(option: BindingOption, spec: string): BoundAction {
    const bound = createAction(option, spec);
    const existing = this.bindings.get(bound.key);
    if (existing) {
      throw new ConfigurationError(
        "DuplicateBinding",
        `--${option}=${spec}: key "${bound.key}" is already bound by --${existing.option}`,
        spec,
      );
    }
    this.bindings.set(bound.key, bound);
    return bound;
  }

  get(key: string): BoundAction | undefined {
    return this.bindings.get(key);
  }

  get size() {
    return this.bindings.size;
  }

  list(): BoundAction[] {
    return [...this.bindings.values()];
  }
}
