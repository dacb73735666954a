import { getAppLogger } from "../logger.js";
import { runAction, type ActionEnv, type ActionRegistry } from "./actions.js";
import { getErrorMessage } from "./errors.js";
import { resolveBuiltin } from "./keymap.js";
import type { Sequencer } from "./sequencer.js";
import type {
  KeyCode,
  Presenter,
  SessionStatus,
  Transition,
} from "./state.js";

const log = getAppLogger("dispatch");

export type DispatcherDeps = {
  sequencer: Sequencer;
  registry: ActionRegistry;
  presenter: Presenter;
  env: ActionEnv;
  printPath: (path: string) => void;
};

/**
 * Handles one keystroke at a time against the session. Built-in keys win
 * over bound ones; anything unknown is ignored.
 */
export class Dispatcher {
  status: SessionStatus = "RUNNING";
  // Tail of the work queue. Failures reach the caller of `enqueue`, not here.
  private tail: Promise<unknown> = Promise.resolve();

  constructor(private readonly deps: DispatcherDeps) {}

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  /** Queues the first load; keys pressed meanwhile wait behind it. */
  start(): Promise<boolean> {
    return this.enqueue(() => this.show());
  }

  /** Queues a keystroke behind everything already pressed. */
  press(key: KeyCode): Promise<Transition> {
    return this.enqueue(() => this.handle(key));
  }

  /** Loads and draws whatever the cursor points at. */
  async show(): Promise<boolean> {
    const { sequencer, presenter } = this.deps;
    const file = sequencer.current();
    const ok = await presenter.load(file);
    if (!ok) log.warn("Cannot load image {file}", { file });
    presenter.render();
    return ok;
  }

  async handle(key: KeyCode): Promise<Transition> {
    if (this.status === "TERMINATED") return { kind: "ignored" };
    const { sequencer, registry, presenter } = this.deps;

    switch (resolveBuiltin(key)) {
      case "next":
        if (!sequencer.advance()) return { kind: "boundary" };
        await this.show();
        return { kind: "advance", index: sequencer.position };
      case "previous":
        if (!sequencer.retreat()) return { kind: "boundary" };
        await this.show();
        return { kind: "retreat", index: sequencer.position };
      case "print": {
        const path = sequencer.current();
        this.deps.printPath(path);
        return { kind: "print", path };
      }
      case "rotate.ccw":
        presenter.rotate(-1);
        presenter.render();
        return { kind: "rotate", direction: -1 };
      case "rotate.cw":
        presenter.rotate(1);
        presenter.render();
        return { kind: "rotate", direction: 1 };
      case "close":
        this.status = "TERMINATED";
        return { kind: "close" };
      case null:
        break;
    }

    const bound = registry.get(key);
    if (!bound) return { kind: "ignored" };

    try {
      const message = await runAction(bound, sequencer.current(), this.deps.env);
      return { kind: "action", key, ok: true, message };
    } catch (err) {
      const message = getErrorMessage(err);
      log.error("{message}", { message });
      return { kind: "action", key, ok: false, message };
    }
  }
}
