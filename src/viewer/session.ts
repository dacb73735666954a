import { getAppLogger } from "../logger.js";
import { ActionRegistry } from "./actions.js";
import type { ViewerOptions } from "./options.js";
import { Sequencer, type Random } from "./sequencer.js";

const log = getAppLogger("session");

export type Session = {
  sequencer: Sequencer;
  registry: ActionRegistry;
};

/**
 * Runs every configuration check up front. Throws a ConfigurationError on
 * the first problem; nothing is shown unless this returns.
 */
export function createSession(
  options: ViewerOptions,
  random: Random = Math.random,
): Session {
  const registry = new ActionRegistry();
  for (const { option, spec } of options.bindings) registry.bind(option, spec);

  const sequencer = Sequencer.build(options.items);
  sequencer.applySort(options.sort, random);
  if (options.start !== null) sequencer.setStart(options.start);

  log.debug("{count} files, sort={sort}, {bindings} bindings", {
    count: sequencer.length,
    sort: options.sort,
    bindings: registry.size,
  });
  return { sequencer, registry };
}
