import { describe, expect, it } from "vitest";
import assert from "node:assert";
import { createToolchain, targetArch } from "@ndk-graph/toolchain";
import {
  NdkGraphErrorCode,
  UnknownStlError,
  isStlFlavor,
  ndkStlLibDir,
  resolveStlPath,
  stlFlavorFromModuleName,
} from "@ndk-graph/cc";

const arm64 = createToolchain("arm64");
const arm64Arch = targetArch("arm64");

describe("resolveStlPath", () => {
  it("resolves the shared libc++ under the llvm-libc++ directory", () => {
    const artifact = resolveStlPath("ndk_libc++_shared", arm64, "libc++", { arch: arm64Arch, isStatic: false });

    expect(artifact).toEqual({
      dir: "prebuilts/ndk/current/sources/cxx-stl/llvm-libc++/libs/arm64-v8a",
      fileName: "libc++.so",
      path: "prebuilts/ndk/current/sources/cxx-stl/llvm-libc++/libs/arm64-v8a/libc++.so",
    });
  });

  it("uses the static archive extension for static STLs", () => {
    const artifact = resolveStlPath("ndk_libstlport_static", createToolchain("x86"), "libstlport", {
      arch: targetArch("x86"),
      isStatic: true,
    });

    expect(artifact.path).toBe("prebuilts/ndk/current/sources/cxx-stl/stlport/libs/x86/libstlport.a");
  });

  it("puts gnustl under the toolchain's GCC version", () => {
    const toolchain = createToolchain("arm", { gccVersion: "4.9" });
    const artifact = resolveStlPath("ndk_libgnustl_shared", toolchain, "libgnustl", {
      arch: targetArch("arm"),
      isStatic: false,
    });

    expect(artifact.path).toBe(
      "prebuilts/ndk/current/sources/cxx-stl/gnu-libstdc++/4.9/libs/armeabi-v7a/libgnustl.so",
    );
  });

  it("uses the toolchain's shared suffix", () => {
    const toolchain = createToolchain("x86_64", { shlibSuffix: ".dylib" });
    const artifact = resolveStlPath("ndk_libc++_shared", toolchain, "libc++", {
      arch: targetArch("x86_64"),
      isStatic: false,
      ndkRoot: "ndk",
    });

    expect(artifact.path).toBe("ndk/sources/cxx-stl/llvm-libc++/libs/x86_64/libc++.dylib");
  });

  it("rejects an unknown flavor without returning a path", () => {
    let artifact: unknown;
    let failure: unknown;
    try {
      artifact = resolveStlPath("ndk_libfoo++_shared", arm64, "libfoo++", { arch: arm64Arch, isStatic: false });
    } catch (error) {
      failure = error;
    }

    expect(artifact).toBeUndefined();
    assert(failure instanceof UnknownStlError);
    expect(failure.code).toBe(NdkGraphErrorCode.UNKNOWN_STL);
    expect(failure.moduleName).toBe("ndk_libfoo++_shared");
    expect(failure.value).toBe("libfoo++");
    expect(failure.message).toBe("Unknown NDK STL: libfoo++");
  });
});

describe("STL flavors", () => {
  it("derives the flavor from the module name", () => {
    expect(stlFlavorFromModuleName("ndk_libc++_shared")).toBe("libc++");
    expect(stlFlavorFromModuleName("ndk_libgnustl_static")).toBe("libgnustl");
  });

  it("recognises exactly three flavors", () => {
    expect(["libstlport", "libc++", "libgnustl"].every(isStlFlavor)).toBe(true);
    expect(isStlFlavor("libfoo++")).toBe(false);
    expect(isStlFlavor("toString")).toBe(false);
  });

  it("throws from the directory lookup as well", () => {
    expect(() => ndkStlLibDir("ndk_libstdc++", arm64, arm64Arch, "libstdc++")).toThrow(UnknownStlError);
  });
});
