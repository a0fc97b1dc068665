/** Prefix every NDK prebuilt module name carries to keep it apart from platform modules. */
export const NDK_PREFIX = "ndk_";
export const NDK_CRT_PREFIX = "ndk_crt";
export const NDK_LIB_PREFIX = "ndk_lib";

const KIND_SUFFIXES = ["_shared", "_static"] as const;

export function hasPrefix(moduleName: string, prefix: string): boolean {
  return moduleName.startsWith(prefix);
}

export function trimNdkPrefix(moduleName: string): string {
  return moduleName.startsWith(NDK_PREFIX) ? moduleName.slice(NDK_PREFIX.length) : moduleName;
}

/**
 * NDK platform prebuilts are named like `ndk_NAME.EXT.SDK_VERSION`;
 * only NAME identifies the file on disk.
 * "ndk_libfoo.so.24" → "libfoo"
 */
export function prebuiltBaseName(moduleName: string): string {
  return trimNdkPrefix(moduleName).split(".")[0] ?? "";
}

/** "libc++_shared" → "libc++"; each suffix is removed at most once, shared first. */
export function trimKindSuffix(name: string): string {
  let result = name;
  for (const suffix of KIND_SUFFIXES) {
    if (result.endsWith(suffix)) {
      result = result.slice(0, -suffix.length);
    }
  }
  return result;
}
