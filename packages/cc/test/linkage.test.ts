/**
 * Variant Mutator Tests
 *
 * Splitting libraries into static/shared variants and reusing the static
 * variant's objects for the shared one.
 */

import { describe, expect, it } from "vitest";
import assert from "node:assert";
import {
  ConfigurationError,
  GraphStateError,
  Module,
  ModuleGraph,
  ModuleTypeRegistry,
  NdkGraphErrorCode,
  REUSE_OBJECTS_TAG,
  expandVariants,
  linkageMutator,
  optimizeReuse,
  registerLibraryModuleTypes,
  registerNdkPrebuiltModuleTypes,
  type BottomUpMutatorContext,
  type LinkageCapability,
  type BuildKind,
  type DependencyTag,
  type ModuleDeclaration,
} from "@ndk-graph/cc";

const registry = registerNdkPrebuiltModuleTypes(registerLibraryModuleTypes(new ModuleTypeRegistry()));

function split(typeName: string, declaration: ModuleDeclaration): ModuleGraph {
  const graph = new ModuleGraph();
  graph.add(registry.create(typeName, declaration));
  graph.runBottomUpMutator("linkage", linkageMutator);
  return graph;
}

function linkageOf(module: Module): LinkageCapability {
  const linkage = module.linker.linkage();
  assert(linkage, `${module.name} has no linkage capability`);
  return linkage;
}

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

/** Host stand-in that records what the mutator asked for. */
class RecordingContext implements BottomUpMutatorContext {
  readonly requested: BuildKind[][] = [];
  readonly edges: { tag: DependencyTag; from: Module; to: Module }[] = [];
  readonly #module: Module;

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
    this.requested.push([...names]);
    return names.map(() => this.#module.clone());
  }

  addInterVariantDependency(tag: DependencyTag, from: Module, to: Module): void {
    this.edges.push({ tag, from, to });
  }
}

describe("expandVariants", () => {
  it("creates [static, shared] for a library building both kinds", () => {
    const module = registry.create("cc_library", { name: "libfoo", srcs: ["foo.c"] });
    const ctx = new RecordingContext(module);

    const variants = expandVariants(ctx, linkageOf(module));

    expect(ctx.requested).toEqual([["static", "shared"]]);
    expect(variants.map((v) => v.buildKind)).toEqual(["static", "shared"]);
    expect(variants.map((v) => v.linker.linkage()?.isStatic())).toEqual([true, false]);
    expect(variants.map((v) => v.id)).toEqual(["libfoo#static", "libfoo#shared"]);
  });

  it("creates a single static variant for a static-only library", () => {
    const module = registry.create("cc_library_static", { name: "libbar", srcs: ["bar.c"] });
    const ctx = new RecordingContext(module);

    const variants = expandVariants(ctx, linkageOf(module));

    expect(variants.map((v) => v.buildKind)).toEqual(["static"]);
    expect(variants[0]?.linker.linkage()?.isStatic()).toBe(true);
  });

  it("creates a single shared variant for a shared-only library", () => {
    const module = registry.create("cc_library_shared", { name: "libbaz", srcs: ["baz.c"] });
    const ctx = new RecordingContext(module);

    const variants = expandVariants(ctx, linkageOf(module));

    expect(variants.map((v) => v.buildKind)).toEqual(["shared"]);
    expect(variants[0]?.linker.linkage()?.isStatic()).toBe(false);
  });

  it("fails before creating anything when neither kind is built", () => {
    const module = registry.create("cc_library", { name: "libnone", buildStatic: false, buildShared: false });
    const ctx = new RecordingContext(module);

    expect(() => expandVariants(ctx, linkageOf(module))).toThrow(ConfigurationError);
    expect(ctx.requested).toEqual([]);
  });

  it("names the module in the configuration error", () => {
    const module = registry.create("cc_library", { name: "libnone", buildStatic: false, buildShared: false });

    const error = thrownBy(() => expandVariants(new RecordingContext(module), linkageOf(module)));

    assert(error instanceof ConfigurationError);
    expect(error.moduleName).toBe("libnone");
    expect(error.code).toBe(NdkGraphErrorCode.NOT_STATIC_OR_SHARED);
    expect(error.message).toBe('library "libnone" not static or shared');
  });
});

describe("optimizeReuse", () => {
  function variantsOf(declaration: ModuleDeclaration): { ctx: RecordingContext; staticVariant: Module; sharedVariant: Module } {
    const module = registry.create("cc_library", declaration);
    const ctx = new RecordingContext(module);
    const [staticVariant, sharedVariant] = expandVariants(ctx, linkageOf(module));
    assert(staticVariant && sharedVariant, "expected two variants");
    return { ctx, staticVariant, sharedVariant };
  }

  it("links the shared variant against the static objects when no kind adds flags", () => {
    const { ctx, staticVariant, sharedVariant } = variantsOf({
      name: "libfoo",
      srcs: ["a.c", "b.c"],
      generatedSources: ["gen.c"],
      cflags: ["-Wall"],
    });

    expect(optimizeReuse(ctx, staticVariant, sharedVariant)).toBe(true);

    expect(ctx.edges).toEqual([{ tag: REUSE_OBJECTS_TAG, from: sharedVariant, to: staticVariant }]);
    expect(sharedVariant.compiler?.properties.srcs).toEqual([]);
    expect(sharedVariant.compiler?.properties.generatedSources).toEqual([]);
    expect(staticVariant.compiler?.properties.srcs).toEqual(["a.c", "b.c"]);
    expect(staticVariant.compiler?.properties.generatedSources).toEqual(["gen.c"]);
  });

  it("does nothing when the static variant has its own flags", () => {
    const { ctx, staticVariant, sharedVariant } = variantsOf({
      name: "libfoo",
      srcs: ["a.c"],
      static: { cflags: ["-DSTATIC_BUILD"] },
    });

    expect(optimizeReuse(ctx, staticVariant, sharedVariant)).toBe(false);

    expect(ctx.edges).toEqual([]);
    expect(sharedVariant.compiler?.properties.srcs).toEqual(["a.c"]);
  });

  it("does nothing when the shared variant has its own flags", () => {
    const { ctx, staticVariant, sharedVariant } = variantsOf({
      name: "libfoo",
      srcs: ["a.c"],
      generatedSources: ["gen.c"],
      shared: { cflags: ["-fvisibility=hidden"] },
    });

    expect(optimizeReuse(ctx, staticVariant, sharedVariant)).toBe(false);

    expect(ctx.edges).toEqual([]);
    expect(sharedVariant.compiler?.properties.srcs).toEqual(["a.c"]);
    expect(sharedVariant.compiler?.properties.generatedSources).toEqual(["gen.c"]);
  });

  it("ignores common flags", () => {
    const { ctx, staticVariant, sharedVariant } = variantsOf({
      name: "libfoo",
      srcs: ["a.c"],
      cflags: ["-O2", "-DCOMMON"],
    });

    expect(optimizeReuse(ctx, staticVariant, sharedVariant)).toBe(true);
    expect(ctx.edges).toHaveLength(1);
  });

  it("skips modules without a compiler", () => {
    const staticStl = registry.create("ndk_prebuilt_static_stl", { name: "ndk_libc++_static" });
    const sharedStl = registry.create("ndk_prebuilt_shared_stl", { name: "ndk_libc++_shared" });
    const ctx = new RecordingContext(staticStl);

    expect(optimizeReuse(ctx, staticStl, sharedStl)).toBe(false);
    expect(ctx.edges).toEqual([]);
  });
});

describe("linkageMutator on a module graph", () => {
  it("replaces a both-kinds library with two variants and one reuse edge", () => {
    const graph = split("cc_library", { name: "libfoo", srcs: ["foo.c"] });

    const [staticVariant, sharedVariant] = graph.variants("libfoo");
    assert(staticVariant && sharedVariant);
    expect(graph.nodes().map((n) => n.id)).toEqual(["libfoo#static", "libfoo#shared"]);
    expect(graph.dependencies(sharedVariant, REUSE_OBJECTS_TAG)).toEqual([staticVariant]);
    expect(graph.dependencies(staticVariant)).toEqual([]);
  });

  it("records no edge when kind-specific flags differ", () => {
    const graph = split("cc_library", { name: "libfoo", srcs: ["foo.c"], shared: { cflags: ["-DSHARED"] } });

    expect(graph.variants("libfoo")).toHaveLength(2);
    expect(graph.edges()).toEqual([]);
  });

  it("never optimizes a single variant", () => {
    const graph = split("cc_library_shared", { name: "libbaz", srcs: ["baz.c"] });

    expect(graph.nodes().map((n) => n.id)).toEqual(["libbaz#shared"]);
    expect(graph.nodes()[0]?.compiler?.properties.srcs).toEqual(["baz.c"]);
    expect(graph.edges()).toEqual([]);
  });

  it("splits prebuilt libraries by their declared kind", () => {
    expect(split("ndk_prebuilt_library", { name: "ndk_libfoo.so.24" }).nodes().map((n) => n.id)).toEqual([
      "ndk_libfoo.so.24#shared",
    ]);
    const staticStl = split("ndk_prebuilt_static_stl", { name: "ndk_libc++_static" }).nodes()[0];
    expect(staticStl?.buildKind).toBe("static");
    expect(staticStl?.linker.linkage()?.isStatic()).toBe(true);
  });

  it("leaves object modules unsplit", () => {
    const graph = split("ndk_prebuilt_object", { name: "ndk_crtbegin_so.o.21" });

    expect(graph.nodes().map((n) => n.id)).toEqual(["ndk_crtbegin_so.o.21"]);
    expect(graph.nodes()[0]?.buildKind).toBeNull();
  });

  it("keeps a failing module logical and exposes no variant", () => {
    const graph = new ModuleGraph();
    graph.add(registry.create("cc_library", { name: "libnone", buildStatic: false, buildShared: false }));
    graph.add(registry.create("cc_library", { name: "libok", srcs: ["ok.c"] }));

    const failures = graph.runBottomUpMutator("linkage", linkageMutator);

    expect(failures.map((f) => f.moduleName)).toEqual(["libnone"]);
    expect(failures[0]?.error).toBeInstanceOf(ConfigurationError);
    expect(graph.nodes().map((n) => n.id)).toEqual(["libnone", "libok#static", "libok#shared"]);
    expect(graph.buildableNodes().map((n) => n.id)).toEqual(["libok#static", "libok#shared"]);
  });

  it("refuses to run the linkage pass twice", () => {
    const graph = split("cc_library", { name: "libfoo", srcs: ["foo.c"] });

    expect(() => graph.runBottomUpMutator("linkage", linkageMutator)).toThrow(GraphStateError);
    expect(graph.nodes()).toHaveLength(2);
  });
});
