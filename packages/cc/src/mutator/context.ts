import type { BuildKind } from "../model/linker.js";
import type { Module } from "../model/module.js";

/** Tag of the build-order edge from a shared variant to the static variant whose objects it links. */
export const REUSE_OBJECTS_TAG = "reuseObjects";

export type DependencyTag = typeof REUSE_OBJECTS_TAG | (string & {});

/**
 * Graph-mutation primitives the host exposes while a bottom-up mutator
 * visits one module. Exactly one visitor sees a given module per pass.
 */
export interface BottomUpMutatorContext {
  module(): Module;
  moduleName(): string;
  /**
   * Replaces the visited module with one copy per name, in the order given.
   * The copies become visible to the rest of the graph only once the
   * mutator returns without throwing.
   */
  createLocalVariations(...names: readonly BuildKind[]): Module[];
  /** Records that `from` must be built after `to`. */
  addInterVariantDependency(tag: DependencyTag, from: Module, to: Module): void;
}

export type BottomUpMutator = (ctx: BottomUpMutatorContext) => void;
