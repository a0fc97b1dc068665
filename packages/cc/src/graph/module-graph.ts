import { GraphStateError, NdkGraphErrorCode, isNdkGraphError, type NdkGraphError } from "../errors.js";
import type { BuildKind } from "../model/linker.js";
import type { Module } from "../model/module.js";
import type { BottomUpMutator, BottomUpMutatorContext, DependencyTag } from "../mutator/context.js";

export interface GraphDependency {
  readonly tag: DependencyTag;
  readonly from: Module;
  readonly to: Module;
}

export interface MutatorFailure {
  readonly moduleName: string;
  readonly error: NdkGraphError;
}

/** Stand-in module name for errors about the graph as a whole. */
const GRAPH = "<graph>";

/**
 * Per-module view handed to a mutator. Variants and edges stay pending
 * until the mutator returns, so a failing module exposes nothing.
 */
class VisitContext implements BottomUpMutatorContext {
  #module: Module;
  created: Module[] | null = null;
  readonly dependencies: GraphDependency[] = [];

  constructor(module: Module) {
    this.#module = module;
  }

  module(): Module {
    return this.#module;
  }

  moduleName(): string {
    return this.#module.name;
  }

  createLocalVariations(...names: readonly BuildKind[]): Module[] {
    if (this.created) {
      throw new GraphStateError(
        `Variants of "${this.#module.name}" were already created in this visit`,
        NdkGraphErrorCode.PASS_ALREADY_RUN,
        this.#module.name,
      );
    }
    const variants = names.map((name) => {
      const variant = this.#module.clone();
      variant.assignBuildKind(name);
      return variant;
    });
    this.created = variants;
    return [...variants];
  }

  addInterVariantDependency(tag: DependencyTag, from: Module, to: Module): void {
    this.dependencies.push({ tag, from, to });
  }
}

/**
 * In-process build graph: owns the module nodes and the recorded
 * build-order edges, and runs mutator passes over them. Each named pass
 * runs at most once.
 */
export class ModuleGraph {
  #nodes: Module[] = [];
  #names = new Set<string>();
  #dependencies: GraphDependency[] = [];
  #completedPasses = new Set<string>();
  #failed = new Map<string, NdkGraphError>();

  add(module: Module): Module {
    if (this.#names.has(module.name)) {
      throw new GraphStateError(
        `Duplicate module "${module.name}"`,
        NdkGraphErrorCode.DUPLICATE_MODULE,
        module.name,
      );
    }
    if (this.#completedPasses.size > 0) {
      throw new GraphStateError(
        `Cannot add "${module.name}" after mutator passes have run`,
        NdkGraphErrorCode.PASS_ALREADY_RUN,
        module.name,
      );
    }
    this.#names.add(module.name);
    this.#nodes.push(module);
    return module;
  }

  nodes(): readonly Module[] {
    return this.#nodes;
  }

  /** Nodes of modules that have not failed a pass. */
  buildableNodes(): readonly Module[] {
    return this.#nodes.filter((node) => !this.#failed.has(node.name));
  }

  variants(name: string): readonly Module[] {
    return this.#nodes.filter((node) => node.name === name);
  }

  find(name: string, kind?: BuildKind): Module | undefined {
    return this.#nodes.find((node) => node.name === name && (kind === undefined || node.buildKind === kind));
  }

  dependencies(module: Module, tag?: DependencyTag): readonly Module[] {
    return this.#dependencies
      .filter((dep) => dep.from === module && (tag === undefined || dep.tag === tag))
      .map((dep) => dep.to);
  }

  edges(): readonly GraphDependency[] {
    return this.#dependencies;
  }

  failure(name: string): NdkGraphError | undefined {
    return this.#failed.get(name);
  }

  hasRun(pass: string): boolean {
    return this.#completedPasses.has(pass);
  }

  /**
   * Visits every buildable module once. Module-level failures
   * (NdkGraphError) stop only that module and are returned; anything else
   * propagates.
   */
  runBottomUpMutator(pass: string, mutator: BottomUpMutator): MutatorFailure[] {
    if (this.#completedPasses.has(pass)) {
      throw new GraphStateError(`Pass "${pass}" has already run`, NdkGraphErrorCode.PASS_ALREADY_RUN, GRAPH, pass);
    }

    const next: Module[] = [];
    const failures: MutatorFailure[] = [];
    for (const module of this.#nodes) {
      if (this.#failed.has(module.name)) {
        next.push(module);
        continue;
      }

      const visit = new VisitContext(module);
      try {
        mutator(visit);
      } catch (error) {
        if (!isNdkGraphError(error)) throw error;
        this.#failed.set(module.name, error);
        failures.push({ moduleName: module.name, error });
        next.push(module);
        continue;
      }

      next.push(...(visit.created ?? [module]));
      this.#dependencies.push(...visit.dependencies);
    }

    this.#nodes = next;
    this.#completedPasses.add(pass);
    return failures;
  }
}
