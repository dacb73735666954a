import type { BindingOption } from "./actions.js";
import { ConfigurationError } from "./errors.js";
import { getHints } from "./keymap.js";
import type { Scale, ScaleMethod, SortPolicy } from "./state.js";

export type BindingSpec = { option: BindingOption; spec: string };

export type ViewerOptions = {
  items: string[];
  bindings: BindingSpec[];
  sort: SortPolicy;
  start: number | null;
  scale: Scale;
  verbose: boolean;
  help: boolean;
};

const SORTS: readonly SortPolicy[] = ["none", "mod", "name", "random"];
const SCALE_METHODS: readonly ScaleMethod[] = ["nearest", "average"];
const BINDING_OPTIONS: readonly BindingOption[] = ["act", "move", "movec", "movesub"];
const VALUE_OPTIONS = new Set<string>([...BINDING_OPTIONS, "sort", "start", "scale"]);

function invalid(message: string, value?: string): ConfigurationError {
  return new ConfigurationError("InvalidOption", message, value);
}

function isBindingOption(name: string): name is BindingOption {
  return BINDING_OPTIONS.some((o) => o === name);
}

export function parseSort(value: string): SortPolicy {
  const sort = SORTS.find((s) => s === value);
  if (!sort) {
    throw invalid(`--sort=${value}: expected one of ${SORTS.join(", ")}`, value);
  }
  return sort;
}

export function parseStart(value: string): number {
  if (!/^-?\d+$/.test(value)) {
    throw invalid(`--start=${value}: expected a whole number`, value);
  }
  return Number(value);
}

export function parseScale(value: string): Scale {
  const [factorText, methodText = "nearest"] = value.split(",", 2);
  const factor = Number(factorText);
  if (!factorText || !Number.isFinite(factor) || factor <= 0) {
    throw invalid(`--scale=${value}: factor must be a positive number`, value);
  }
  const method = SCALE_METHODS.find((m) => m === methodText);
  if (!method) {
    throw invalid(
      `--scale=${value}: method must be one of ${SCALE_METHODS.join(", ")}`,
      value,
    );
  }
  return { factor, method };
}

export function parseOptions(argv: readonly string[]): ViewerOptions {
  const opts: ViewerOptions = {
    items: [],
    bindings: [],
    sort: "none",
    start: null,
    scale: { factor: 1, method: "nearest" },
    verbose: false,
    help: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === "--") {
      opts.items.push(...argv.slice(i + 1));
      break;
    }
    if (arg === "-h" || arg === "--help") {
      opts.help = true;
      continue;
    }
    if (!arg.startsWith("--")) {
      opts.items.push(arg);
      continue;
    }

    const eq = arg.indexOf("=");
    const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
    let value: string | undefined = eq === -1 ? undefined : arg.slice(eq + 1);

    if (name === "random" || name === "verbose") {
      if (value !== undefined) throw invalid(`--${name} takes no value`, arg);
      if (name === "random") opts.sort = "random";
      else opts.verbose = true;
      continue;
    }
    if (!VALUE_OPTIONS.has(name)) throw invalid(`unknown option ${arg}`, arg);

    if (value === undefined) {
      value = argv[++i];
      if (value === undefined) throw invalid(`--${name} needs a value`, arg);
    }

    if (isBindingOption(name)) {
      opts.bindings.push({ option: name, spec: value });
    } else if (name === "sort") {
      opts.sort = parseSort(value);
    } else if (name === "start") {
      opts.start = parseStart(value);
    } else {
      opts.scale = parseScale(value);
    }
  }

  return opts;
}

export function usage(): string {
  const keys = getHints().map((h) => `  ${h.keys.padEnd(14)}${h.title}`);
  return [
    "usage: sortview [options] item...",
    "",
    "Items are files or directories; end a directory with ... to include",
    "everything below it.",
    "",
    "options:",
    "  --act=K:CMD        run CMD with %s replaced by the file when K is pressed",
    "  --move=K:DIR       move the file into DIR",
    "  --movec=K:DIR      same, creating DIR on first use",
    "  --movesub=K:DIR    move into DIR/<name of the file's folder>",
    "  --sort=ORDER       none, mod, name or random",
    "  --random           same as --sort=random",
    "  --start=N          begin at the Nth file after sorting",
    "  --scale=F[,M]      zoom factor, M is nearest or average",
    "  --verbose          debug logging",
    "  -h, --help         show this text",
    "",
    "keys:",
    ...keys,
  ].join("\n");
}
