import type { ArchType, Bitness } from "./arch.js";
import { DEFAULT_ARCHES, isArchType } from "./arch.js";

export const DEFAULT_GCC_VERSION = "4.9";
export const SHARED_LIBRARY_SUFFIX = ".so";
export const STATIC_LIBRARY_EXTENSION = ".a";
export const OBJECT_EXTENSION = ".o";

/**
 * Toolchain facts needed to name and locate artifacts. Discovery of the
 * actual compilers happens elsewhere; this is only what the path
 * resolvers read.
 */
export interface Toolchain {
  /** Directory name used under `arch-<name>` in the platform prebuilts. */
  readonly name: string;
  readonly archType: ArchType;
  readonly bits: Bitness;
  readonly gccVersion: string;
  readonly shlibSuffix: string;
  readonly staticLibSuffix: string;
}

export type ToolchainOverrides = Partial<Omit<Toolchain, "archType" | "bits">>;

export function createToolchain(archType: ArchType, overrides: ToolchainOverrides = {}): Toolchain {
  return {
    name: overrides.name ?? archType,
    archType,
    bits: DEFAULT_ARCHES[archType].bits,
    gccVersion: overrides.gccVersion ?? DEFAULT_GCC_VERSION,
    shlibSuffix: overrides.shlibSuffix ?? SHARED_LIBRARY_SUFFIX,
    staticLibSuffix: overrides.staticLibSuffix ?? STATIC_LIBRARY_EXTENSION,
  };
}

export function is64Bit(toolchain: Toolchain): boolean {
  return toolchain.bits === 64;
}

/**
 * Looks up the default toolchain for an architecture name as written in a
 * build declaration. Returns undefined for names outside ARCH_TYPES.
 */
export function findToolchain(arch: string, overrides?: ToolchainOverrides): Toolchain | undefined {
  if (!isArchType(arch)) return undefined;
  return createToolchain(arch, overrides);
}
