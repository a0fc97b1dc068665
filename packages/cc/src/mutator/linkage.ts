import { debug } from "@ndk-graph/shared";
import { ConfigurationError } from "../errors.js";
import type { BuildKind, LinkageCapability } from "../model/linker.js";
import type { Module } from "../model/module.js";
import { REUSE_OBJECTS_TAG, type BottomUpMutatorContext } from "./context.js";

/**
 * Build kinds a library asks for, in variant order. Static always comes
 * first: callers index the result of `expandVariants` by position.
 */
export function requestedBuildKinds(linkage: LinkageCapability): BuildKind[] {
  const kinds: BuildKind[] = [];
  if (linkage.buildStatic()) kinds.push("static");
  if (linkage.buildShared()) kinds.push("shared");
  return kinds;
}

/**
 * Splits the visited library module into its static and/or shared variants.
 *
 * @returns `[static, shared]`, `[static]` or `[shared]`
 * @throws ConfigurationError when the module builds neither kind; no variant is created
 */
export function expandVariants(ctx: BottomUpMutatorContext, linkage: LinkageCapability): Module[] {
  const kinds = requestedBuildKinds(linkage);
  if (kinds.length === 0) {
    throw new ConfigurationError(ctx.moduleName());
  }

  const variants = ctx.createLocalVariations(...kinds);
  kinds.forEach((kind, index) => {
    variants[index]?.assignBuildKind(kind);
  });

  debug.mutate("variants.created", { module: ctx.moduleName(), kinds });
  return variants;
}

/**
 * Lets the shared variant link the static variant's objects instead of
 * compiling the same sources twice. Applies only when neither kind adds
 * flags of its own, so both would produce identical object code.
 *
 * @returns whether the reuse edge was recorded
 */
export function optimizeReuse(
  ctx: BottomUpMutatorContext,
  staticVariant: Module,
  sharedVariant: Module,
): boolean {
  const staticCompiler = staticVariant.compiler;
  const sharedCompiler = sharedVariant.compiler;
  if (!staticCompiler || !sharedCompiler) {
    return false;
  }

  const staticFlags = staticCompiler.additionalFlags("static");
  const sharedFlags = sharedCompiler.additionalFlags("shared");
  if (staticFlags.length > 0 || sharedFlags.length > 0) {
    debug.reuse("skipped", {
      module: ctx.moduleName(),
      staticFlags: [...staticFlags],
      sharedFlags: [...sharedFlags],
    });
    return false;
  }

  ctx.addInterVariantDependency(REUSE_OBJECTS_TAG, sharedVariant, staticVariant);
  sharedCompiler.properties.srcs = [];
  sharedCompiler.properties.generatedSources = [];

  debug.reuse("edge.recorded", { module: ctx.moduleName(), from: sharedVariant.id, to: staticVariant.id });
  return true;
}

/**
 * The linkage pass: expand every library into its variants, then wire up
 * object reuse when both variants exist. Modules without a linkage
 * capability (object files) are left untouched.
 */
export function linkageMutator(ctx: BottomUpMutatorContext): void {
  const linkage = ctx.module().linker.linkage();
  if (!linkage) return;

  const [first, second] = expandVariants(ctx, linkage);
  if (first && second) {
    optimizeReuse(ctx, first, second);
  }
}
