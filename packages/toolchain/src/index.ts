/**
 * @ndk-graph/toolchain
 *
 * Architecture and toolchain descriptors consumed by the prebuilt path
 * resolvers.
 */

export {
  type ArchType,
  type Bitness,
  type TargetArch,
  ARCH_TYPES,
  DEFAULT_ARCHES,
  isArchType,
  targetArch,
  primaryAbi,
} from "./arch.js";

export {
  type Toolchain,
  type ToolchainOverrides,
  DEFAULT_GCC_VERSION,
  SHARED_LIBRARY_SUFFIX,
  STATIC_LIBRARY_EXTENSION,
  OBJECT_EXTENSION,
  createToolchain,
  findToolchain,
  is64Bit,
} from "./toolchain.js";
