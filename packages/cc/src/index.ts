/**
 * @ndk-graph/cc
 *
 * Splits library modules into static/shared variants and resolves the
 * paths of NDK prebuilt artifacts.
 *
 * @example
 * ```typescript
 * import { ModuleGraph, ModuleTypeRegistry, registerNdkPrebuiltModuleTypes, runBuildGraph } from "@ndk-graph/cc";
 * import { createToolchain, targetArch } from "@ndk-graph/toolchain";
 *
 * const registry = registerNdkPrebuiltModuleTypes(new ModuleTypeRegistry());
 * const graph = new ModuleGraph();
 * graph.add(registry.create("ndk_prebuilt_library", { name: "ndk_libfoo.so.24", sdkVersion: "24" }));
 *
 * const { outputs } = runBuildGraph(graph, { toolchain: createToolchain("x86_64"), arch: targetArch("x86_64") });
 * // outputs.get("ndk_libfoo.so.24#shared") →
 * //   prebuilts/ndk/current/platforms/android-24/arch-x86_64/usr/lib64/libfoo.so
 * ```
 */

// Errors
export {
  NdkGraphError,
  ConfigurationError,
  NamingError,
  UnknownStlError,
  GraphStateError,
  NdkGraphErrorCode,
  isNdkGraphError,
  type NdkGraphErrorCodeType,
} from "./errors.js";

// Model
export {
  type BuildKind,
  type PrebuiltArtifactKind,
  type LinkStrategy,
  type LinkageCapability,
  type Linker,
  type LibraryLinkerProperties,
  COMPILED,
  prebuilt,
  LibraryLinker,
  ObjectLinker,
} from "./model/linker.js";
export {
  type KindFlags,
  type LibraryCompilerProperties,
  type ModuleProperties,
  type PrebuiltArtifactRef,
  LibraryCompiler,
  Module,
} from "./model/module.js";

// Variant mutator
export {
  REUSE_OBJECTS_TAG,
  type DependencyTag,
  type BottomUpMutatorContext,
  type BottomUpMutator,
} from "./mutator/context.js";
export { requestedBuildKinds, expandVariants, optimizeReuse, linkageMutator } from "./mutator/linkage.js";

// Prebuilt paths
export {
  NDK_PREFIX,
  NDK_CRT_PREFIX,
  NDK_LIB_PREFIX,
  hasPrefix,
  trimNdkPrefix,
  prebuiltBaseName,
  trimKindSuffix,
} from "./prebuilt/naming.js";
export {
  DEFAULT_NDK_ROOT,
  NON_MULTILIB_64BIT_ARCHES,
  libDirSuffix,
  ndkLibDir,
  resolvePrebuiltPath,
} from "./prebuilt/ndk-prebuilt.js";
export {
  type StlFlavor,
  type StlPathOptions,
  STL_LIB_DIRS,
  isStlFlavor,
  stlFlavorFromModuleName,
  ndkStlLibDir,
  resolveStlPath,
} from "./prebuilt/ndk-stl.js";

// Link phase
export { type LinkContext, type LinkOutcome, linkVariant } from "./link.js";

// Module types
export {
  type ModuleDeclaration,
  type ModuleFactory,
  ModuleTypeRegistry,
  registerNdkPrebuiltModuleTypes,
  registerLibraryModuleTypes,
  ndkPrebuiltLibraryFactory,
  ndkPrebuiltObjectFactory,
  ndkPrebuiltSharedStlFactory,
  ndkPrebuiltStaticStlFactory,
  libraryFactory,
  libraryStaticFactory,
  librarySharedFactory,
} from "./module-types.js";

// Host graph and pipeline
export { type GraphDependency, type MutatorFailure, ModuleGraph } from "./graph/module-graph.js";
export {
  type BuildTarget,
  type ModuleFailure,
  type BuildGraphResult,
  LINKAGE_PASS,
  runBuildGraph,
} from "./pipeline.js";

// Options
export {
  type NdkGraphOptions,
  type ResolvedNdkGraphOptions,
  NDK_ROOT_ENV_VAR,
  DEFAULT_SDK_VERSION,
  DEFAULT_OPTIONS,
  normalizeOptions,
} from "./options.js";
