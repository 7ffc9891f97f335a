import { CadenceScheduler, type RandomSource } from "../cadence/scheduler.js";
import type { ChannelRegistry } from "../channels/registry.js";
import type { AmicusConfig } from "../config/types.js";
import { PersonaCatalog } from "../conversation/persona.js";
import { DispatchLoop } from "../dispatch/loop.js";
import { createGenerator } from "../generation/factory.js";
import type { TextGenerator } from "../generation/types.js";
import type { Logger } from "../logging/logger.js";
import { ContentFilter } from "../policy/content-filter.js";
import { PolicyEngine } from "../policy/engine.js";
import type { ConversationStore } from "../store/types.js";

export interface EngineDeps {
  store: ConversationStore;
  registry: ChannelRegistry;
  logger: Logger;
  generator?: TextGenerator;
  clock?: () => number;
  random?: RandomSource;
}

export interface Engine {
  policy: PolicyEngine;
  scheduler: CadenceScheduler;
  personas: PersonaCatalog;
  generator: TextGenerator;
  loop: DispatchLoop;
}

/** Wires one independent engine instance from a validated config. */
export function buildEngine(config: AmicusConfig, deps: EngineDeps): Engine {
  const policy = new PolicyEngine(config.policy);
  const scheduler = new CadenceScheduler(config.cadence, config.policy.quietHours, deps.random);
  const personas = new PersonaCatalog(config.personas, config.defaultPersona);
  const generator = deps.generator ?? createGenerator(config.generation, deps.logger);

  const loop = new DispatchLoop({
    store: deps.store,
    policy,
    scheduler,
    generator,
    contentFilter: new ContentFilter(config.policy.contentFilter),
    registry: deps.registry,
    personas,
    logger: deps.logger,
    config: config.dispatch,
    defaultTimezone: config.policy.timezone,
    clock: deps.clock,
  });

  return { policy, scheduler, personas, generator, loop };
}
