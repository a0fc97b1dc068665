import { debug, joinSourcePath } from "@ndk-graph/shared";
import { OBJECT_EXTENSION, type TargetArch, type Toolchain } from "@ndk-graph/toolchain";
import { NamingError } from "./errors.js";
import type { PrebuiltArtifactKind } from "./model/linker.js";
import type { Module, PrebuiltArtifactRef } from "./model/module.js";
import { REUSE_OBJECTS_TAG, type DependencyTag } from "./mutator/context.js";
import type { ResolvedNdkGraphOptions } from "./options.js";
import { NDK_CRT_PREFIX, NDK_LIB_PREFIX, NDK_PREFIX, hasPrefix } from "./prebuilt/naming.js";
import { resolvePrebuiltPath } from "./prebuilt/ndk-prebuilt.js";
import { resolveStlPath, stlFlavorFromModuleName } from "./prebuilt/ndk-stl.js";

/** What the host provides for the link phase of one variant. */
export interface LinkContext {
  readonly toolchain: Toolchain;
  readonly arch: TargetArch;
  readonly options: ResolvedNdkGraphOptions;
  dependencies(module: Module, tag: DependencyTag): readonly Module[];
}

export type LinkOutcome =
  | {
      readonly kind: "compiled";
      /** Variant whose objects get linked: the module itself, or its static sibling. */
      readonly objectsFrom: string;
    }
  | {
      readonly kind: "prebuilt";
      readonly artifact: PrebuiltArtifactRef;
      readonly exportedFlags: readonly string[];
    };

/**
 * Link step for one variant. Compiled modules only report where their
 * objects come from; prebuilt modules resolve (once) the path of the
 * artifact shipped with the NDK.
 */
export function linkVariant(module: Module, ctx: LinkContext): LinkOutcome {
  const strategy = module.linker.strategy;
  if (strategy.kind === "compiled") {
    const reused = ctx.dependencies(module, REUSE_OBJECTS_TAG)[0];
    debug.link("compiled", { module: module.id, reused: reused?.id ?? null });
    return { kind: "compiled", objectsFrom: reused?.id ?? module.id };
  }

  const artifact = linkPrebuilt(module, strategy.artifact, ctx);
  return { kind: "prebuilt", artifact, exportedFlags: module.exportedFlags };
}

function linkPrebuilt(module: Module, kind: PrebuiltArtifactKind, ctx: LinkContext): PrebuiltArtifactRef {
  const { toolchain, options } = ctx;
  const sdkVersion = module.properties.sdkVersion ?? options.defaultSdkVersion;

  switch (kind) {
    case "object":
      // NDK objects have no dependencies and export nothing.
      requirePrefix(module, NDK_CRT_PREFIX);
      return module.prebuiltArtifact(() =>
        resolvePrebuiltPath(module.name, toolchain, sdkVersion, OBJECT_EXTENSION, options.ndkRoot),
      );
    case "library":
      requirePrefix(module, NDK_PREFIX);
      exportIncludes(module, "-isystem");
      return module.prebuiltArtifact(() =>
        resolvePrebuiltPath(module.name, toolchain, sdkVersion, toolchain.shlibSuffix, options.ndkRoot),
      );
    case "stl": {
      requirePrefix(module, NDK_LIB_PREFIX);
      exportIncludes(module, "-I");
      const isStatic = module.linker.linkage()?.isStatic() ?? false;
      return module.prebuiltArtifact(() =>
        resolveStlPath(module.name, toolchain, stlFlavorFromModuleName(module.name), {
          arch: ctx.arch,
          isStatic,
          ndkRoot: options.ndkRoot,
        }),
      );
    }
    default: {
      const unreachable: never = kind;
      throw new Error(`Unhandled prebuilt artifact kind: ${String(unreachable)}`);
    }
  }
}

function requirePrefix(module: Module, prefix: string): void {
  if (!hasPrefix(module.name, prefix)) {
    throw new NamingError(module.name, prefix);
  }
}

/** Include directories handed to dependents, each behind `flag` (`-isystem` or `-I`). */
function exportIncludes(module: Module, flag: string): void {
  module.setExportedFlags(module.linker.exportIncludeDirs.map((dir) => flag + joinSourcePath(module.dir, dir)));
}
