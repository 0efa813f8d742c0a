/**
 * Lexical position of the walk: the module plus the enclosing class and
 * function names, outermost first. Values are immutable; entering a scope
 * returns a new context.
 */
export interface ScopeContext {
  readonly moduleName: string;
  readonly path: readonly string[];
}

export function moduleScope(moduleName: string): ScopeContext {
  return { moduleName, path: [] };
}

export function enterScope(context: ScopeContext, name: string): ScopeContext {
  return { moduleName: context.moduleName, path: [...context.path, name] };
}

/**
 * The module name at top level, "module.Outer.inner" below it.
 */
export function scopeId(context: ScopeContext): string {
  return [context.moduleName, ...context.path].join(".");
}

export function innermostName(context: ScopeContext): string | undefined {
  return context.path[context.path.length - 1];
}
