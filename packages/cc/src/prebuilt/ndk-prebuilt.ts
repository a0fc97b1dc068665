import { debug, joinSourcePath, sourcePath, type SourcePath } from "@ndk-graph/shared";
import { is64Bit, type ArchType, type Toolchain } from "@ndk-graph/toolchain";
import type { PrebuiltArtifactRef } from "../model/module.js";
import { prebuiltBaseName } from "./naming.js";

export const DEFAULT_NDK_ROOT = "prebuilts/ndk/current";

/**
 * 64-bit architectures whose NDK toolchain is not multilib and therefore
 * keeps platform libraries in `usr/lib` rather than `usr/lib64`. This is a
 * list of known layouts, not a rule: add an entry only for an architecture
 * whose prebuilts are actually laid out that way.
 */
export const NON_MULTILIB_64BIT_ARCHES: ReadonlySet<ArchType> = new Set<ArchType>(["arm64"]);

export function libDirSuffix(toolchain: Toolchain): "64" | "" {
  if (!is64Bit(toolchain)) return "";
  return NON_MULTILIB_64BIT_ARCHES.has(toolchain.archType) ? "" : "64";
}

/** `<root>/platforms/android-<version>/arch-<toolchain>/usr/lib<suffix>` */
export function ndkLibDir(
  toolchain: Toolchain,
  platformVersion: string,
  ndkRoot: string = DEFAULT_NDK_ROOT,
): SourcePath {
  return sourcePath(
    ndkRoot,
    "platforms",
    `android-${platformVersion}`,
    `arch-${toolchain.name}`,
    "usr",
    `lib${libDirSuffix(toolchain)}`,
  );
}

/**
 * Location of a platform prebuilt (library or crt object) for one
 * toolchain and platform version. The caller checks the module name's
 * prefix first; nothing is validated here.
 */
export function resolvePrebuiltPath(
  moduleName: string,
  toolchain: Toolchain,
  platformVersion: string,
  extension: string,
  ndkRoot: string = DEFAULT_NDK_ROOT,
): PrebuiltArtifactRef {
  const dir = ndkLibDir(toolchain, platformVersion, ndkRoot);
  const fileName = prebuiltBaseName(moduleName) + extension;
  const path = joinSourcePath(dir, fileName);
  debug.prebuilt("resolved", { module: moduleName, toolchain: toolchain.name, platformVersion, path });
  return { dir, fileName, path };
}
