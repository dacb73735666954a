#!/usr/bin/env node
import blessed from "neo-blessed";
import path from "node:path";

import { getAppLogger, initLogger, useConsoleSink, useStatusSink } from "./logger.js";
import type { CommandRunner } from "./viewer/actions.js";
import { Dispatcher } from "./viewer/dispatch.js";
import { ConfigurationError } from "./viewer/errors.js";
import { toKeyCode } from "./viewer/keymap.js";
import { parseOptions, usage, type ViewerOptions } from "./viewer/options.js";
import { PathPrinter, errorLine, exitStatus } from "./viewer/output.js";
import { PictureView } from "./viewer/picture.js";
import { createSession, type Session } from "./viewer/session.js";
import type { Transition } from "./viewer/state.js";

const log = getAppLogger("main");

function fail(err: unknown): never {
  process.stderr.write(errorLine(err));
  process.exit(exitStatus(err));
}

async function setup(
  argv: string[],
): Promise<{ options: ViewerOptions; session: Session } | null> {
  try {
    const options = parseOptions(argv);
    if (options.help) return null;
    await initLogger(options.verbose);
    return { options, session: createSession(options) };
  } catch (err) {
    if (err instanceof ConfigurationError) fail(err);
    throw err;
  }
}

function statusText(session: Session, message: string): string {
  const { sequencer } = session;
  const pos = `${sequencer.position + 1}/${sequencer.length}`;
  const file = path.basename(sequencer.current());
  return ` ${pos}  ${file}${message ? ` — ${message}` : ""}`;
}

function describe(t: Transition): string {
  switch (t.kind) {
    case "action":
      return t.message;
    case "print":
      return `printed ${t.path}`;
    case "boundary":
      return "no more files this way";
    default:
      return "";
  }
}

async function main() {
  const ready = await setup(process.argv.slice(2));
  if (!ready) {
    process.stdout.write(usage() + "\n");
    return;
  }
  const { options, session } = ready;

  // Keep stdout free for printed paths when it is not the terminal.
  const drawOnStderr = !process.stdout.isTTY;
  const screen = blessed.screen({
    smartCSR: true,
    title: "sortview",
    fullUnicode: true,
    output: drawOnStderr ? process.stderr : process.stdout,
  });

  const pictureBox = blessed.box({
    top: 0,
    left: 0,
    width: "100%",
    height: "100%-1",
    tags: true,
  });
  const status = blessed.box({
    bottom: 0,
    left: 0,
    width: "100%",
    height: 1,
    style: { inverse: true },
  });
  screen.append(pictureBox);
  screen.append(status);

  let statusMessage = "";
  const printer = new PathPrinter(process.stdout, drawOnStderr);

  const renderStatus = () => {
    status.setContent(statusText(session, statusMessage));
    screen.render();
  };

  const picture = new PictureView(
    () => ({ cols: Number(screen.width), rows: Number(screen.height) - 1 }),
    (lines) => {
      pictureBox.setContent(lines.join("\n"));
      screen.render();
    },
    options.scale,
  );

  // The child gets the real terminal; the screen comes back when it exits.
  const runInScreen: CommandRunner = (command) =>
    new Promise((resolve) => {
      const shell = process.env.SHELL ?? "/bin/sh";
      screen.exec(shell, ["-c", command], {}, (err: unknown, ok: unknown) => {
        if (err) log.error("Cannot run {command}: {err}", { command, err });
        resolve(ok === true);
      });
    });

  const dispatcher = new Dispatcher({
    sequencer: session.sequencer,
    registry: session.registry,
    presenter: picture,
    env: { runCommand: runInScreen },
    printPath: (p) => printer.print(p),
  });

  let finished = false;
  const finish = async (err?: unknown) => {
    if (finished) return;
    finished = true;
    screen.destroy();
    await useConsoleSink();
    printer.flush();
    if (err !== undefined) process.stderr.write(errorLine(err));
    process.exit(exitStatus(err));
  };

  await useStatusSink((text) => {
    statusMessage = text;
    renderStatus();
  });

  screen.on("resize", () => {
    picture.render();
    renderStatus();
  });

  // The dispatcher queues keystrokes behind the first load and each other.
  dispatcher
    .start()
    .then(() => renderStatus())
    .catch((err: unknown) => finish(err));

  screen.on("keypress", (ch, key) => {
    dispatcher
      .press(toKeyCode(ch, key))
      .then((t) => {
        if (t.kind === "close") return finish();
        if (t.kind === "advance" || t.kind === "retreat") statusMessage = "";
        const message = describe(t);
        if (message) statusMessage = message;
        renderStatus();
      })
      .catch((err: unknown) => finish(err));
  });
}

main().catch((err: unknown) => fail(err));
