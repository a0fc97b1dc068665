import { debug, joinSourcePath, sourcePath, type SourcePath } from "@ndk-graph/shared";
import { primaryAbi, type TargetArch, type Toolchain } from "@ndk-graph/toolchain";
import { UnknownStlError } from "../errors.js";
import type { PrebuiltArtifactRef } from "../model/module.js";
import { DEFAULT_NDK_ROOT } from "./ndk-prebuilt.js";
import { trimKindSuffix, trimNdkPrefix } from "./naming.js";

export type StlFlavor = "libstlport" | "libc++" | "libgnustl";

/**
 * Where each STL keeps its per-ABI libraries, relative to `<root>/sources`.
 * Unlike platform prebuilts these do not vary with the platform version.
 */
export const STL_LIB_DIRS: Readonly<Record<StlFlavor, (toolchain: Toolchain) => string>> = {
  libstlport: () => "cxx-stl/stlport/libs",
  "libc++": () => "cxx-stl/llvm-libc++/libs",
  libgnustl: (toolchain) => `cxx-stl/gnu-libstdc++/${toolchain.gccVersion}/libs`,
};

export function isStlFlavor(value: string): value is StlFlavor {
  return Object.prototype.hasOwnProperty.call(STL_LIB_DIRS, value);
}

/** "ndk_libc++_shared" → "libc++" */
export function stlFlavorFromModuleName(moduleName: string): string {
  return trimKindSuffix(trimNdkPrefix(moduleName));
}

/**
 * @throws UnknownStlError for a flavor outside STL_LIB_DIRS
 */
export function ndkStlLibDir(
  moduleName: string,
  toolchain: Toolchain,
  arch: TargetArch,
  stlFlavor: string,
  ndkRoot: string = DEFAULT_NDK_ROOT,
): SourcePath {
  if (!isStlFlavor(stlFlavor)) {
    debug.stl("unknown", { module: moduleName, stl: stlFlavor });
    throw new UnknownStlError(moduleName, stlFlavor);
  }
  return sourcePath(ndkRoot, "sources", STL_LIB_DIRS[stlFlavor](toolchain), primaryAbi(arch));
}

export interface StlPathOptions {
  arch: TargetArch;
  /** True for the static-STL variant: `.a` instead of the shared suffix. */
  isStatic: boolean;
  ndkRoot?: string;
}

export function resolveStlPath(
  moduleName: string,
  toolchain: Toolchain,
  stlFlavor: string,
  options: StlPathOptions,
): PrebuiltArtifactRef {
  const dir = ndkStlLibDir(moduleName, toolchain, options.arch, stlFlavor, options.ndkRoot);
  const extension = options.isStatic ? toolchain.staticLibSuffix : toolchain.shlibSuffix;
  const fileName = stlFlavorFromModuleName(moduleName) + extension;
  const path = joinSourcePath(dir, fileName);
  debug.stl("resolved", { module: moduleName, stl: stlFlavor, path });
  return { dir, fileName, path };
}
