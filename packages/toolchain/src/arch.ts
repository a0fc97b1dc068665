/**
 * Target architectures known to the NDK prebuilt layout.
 */
export type ArchType = "arm" | "arm64" | "x86" | "x86_64" | "mips" | "mips64";

export type Bitness = 32 | 64;

/**
 * Read-only architecture metadata supplied by the host for the variant
 * being built. `abi[0]` is the primary ABI; STL prebuilts live under it.
 */
export interface TargetArch {
  readonly type: ArchType;
  readonly bits: Bitness;
  readonly abi: readonly string[];
}

export const ARCH_TYPES: readonly ArchType[] = ["arm", "arm64", "x86", "x86_64", "mips", "mips64"];

export const DEFAULT_ARCHES: Readonly<Record<ArchType, TargetArch>> = {
  arm: { type: "arm", bits: 32, abi: ["armeabi-v7a", "armeabi"] },
  arm64: { type: "arm64", bits: 64, abi: ["arm64-v8a"] },
  x86: { type: "x86", bits: 32, abi: ["x86"] },
  x86_64: { type: "x86_64", bits: 64, abi: ["x86_64"] },
  mips: { type: "mips", bits: 32, abi: ["mips"] },
  mips64: { type: "mips64", bits: 64, abi: ["mips64"] },
};

export function isArchType(value: string): value is ArchType {
  return ARCH_TYPES.some((type) => type === value);
}

/** Architecture metadata, with the default ABI list replaced when given. */
export function targetArch(type: ArchType, abi?: readonly string[]): TargetArch {
  const base = DEFAULT_ARCHES[type];
  if (!abi || abi.length === 0) return base;
  return { ...base, abi: [...abi] };
}

export function primaryAbi(arch: TargetArch): string {
  return arch.abi[0] ?? arch.type;
}
