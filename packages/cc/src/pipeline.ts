import { LOG_PREFIX } from "@ndk-graph/shared";
import type { TargetArch, Toolchain } from "@ndk-graph/toolchain";
import { isNdkGraphError, type NdkGraphError } from "./errors.js";
import type { ModuleGraph } from "./graph/module-graph.js";
import { linkVariant, type LinkContext, type LinkOutcome } from "./link.js";
import { REUSE_OBJECTS_TAG } from "./mutator/context.js";
import { linkageMutator } from "./mutator/linkage.js";
import { normalizeOptions, type NdkGraphOptions } from "./options.js";

export const LINKAGE_PASS = "linkage";

export interface BuildTarget {
  toolchain: Toolchain;
  arch: TargetArch;
}

export interface ModuleFailure {
  moduleName: string;
  phase: "mutate" | "link";
  error: NdkGraphError;
}

export interface BuildGraphResult {
  /** Link outcome per variant id (`name#static`, `name#shared`, or the bare name). */
  outputs: ReadonlyMap<string, LinkOutcome>;
  failures: readonly ModuleFailure[];
}

/**
 * Runs the two phases over a populated graph:
 * 1. Mutation: the linkage pass splits every library into variants.
 * 2. Link: every surviving variant is linked (prebuilt paths resolved).
 *
 * The mutation phase finishes for all modules before any link starts, so
 * reuse edges are always in place when a shared variant is linked.
 */
export function runBuildGraph(
  graph: ModuleGraph,
  target: BuildTarget,
  options?: NdkGraphOptions,
): BuildGraphResult {
  const resolved = normalizeOptions(options);
  const log = resolved.logger;
  const failures: ModuleFailure[] = [];

  log.info(`${LOG_PREFIX} splitting ${graph.nodes().length} modules into variants...`);
  for (const failure of graph.runBottomUpMutator(LINKAGE_PASS, linkageMutator)) {
    log.error(`${LOG_PREFIX} ${failure.moduleName}: ${failure.error.message}`);
    failures.push({ moduleName: failure.moduleName, phase: "mutate", error: failure.error });
  }

  const ctx: LinkContext = {
    toolchain: target.toolchain,
    arch: target.arch,
    options: resolved,
    dependencies: (module, tag) => graph.dependencies(module, tag),
  };

  log.info(`${LOG_PREFIX} linking for ${target.toolchain.name} (${target.arch.abi.join(", ")})...`);
  const outputs = new Map<string, LinkOutcome>();
  const failedInLink = new Set<string>();
  for (const variant of graph.buildableNodes()) {
    if (failedInLink.has(variant.name)) continue;
    try {
      outputs.set(variant.id, linkVariant(variant, ctx));
    } catch (error) {
      if (!isNdkGraphError(error)) throw error;
      log.error(`${LOG_PREFIX} ${variant.id}: ${error.message}`);
      failedInLink.add(variant.name);
      failures.push({ moduleName: variant.name, phase: "link", error });
    }
  }

  // A module that failed in either variant contributes no outputs at all.
  for (const name of failedInLink) {
    for (const variant of graph.variants(name)) outputs.delete(variant.id);
  }

  const reused = graph.edges().filter((edge) => edge.tag === REUSE_OBJECTS_TAG).length;
  log.info(
    `${LOG_PREFIX} complete: ${outputs.size} variants linked, ${reused} reusing objects, ${failures.length} failed`,
  );

  return { outputs, failures };
}
