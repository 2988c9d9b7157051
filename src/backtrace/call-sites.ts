/**
 * A function whose frame (and everything above it) is left out of a capture.
 * Handed to V8 as `Error.captureStackTrace`'s `constructorOpt`.
 */
export type StackEntry = (...args: never[]) => unknown;

/**
 * Structured V8 call sites for the frames below `entry`, innermost first.
 *
 * Swaps `Error.prepareStackTrace` and `Error.stackTraceLimit` for the duration of
 * the capture and restores whatever was installed (test runners and source-map
 * hooks install their own).
 */
export function captureCallSites(limit: number, entry: StackEntry): readonly NodeJS.CallSite[] {
  const previousPrepare = Error.prepareStackTrace;
  const previousLimit = Error.stackTraceLimit;
  let sites: readonly NodeJS.CallSite[] = [];

  try {
    Error.stackTraceLimit = limit;
    Error.prepareStackTrace = (_error, callSites) => {
      sites = callSites;
      return '';
    };
    const holder: { stack?: string } = {};
    Error.captureStackTrace(holder, entry);
    // V8 formats lazily: reading `stack` is what runs prepareStackTrace.
    if (holder.stack === undefined) return [];
  } finally {
    Error.prepareStackTrace = previousPrepare;
    Error.stackTraceLimit = previousLimit;
  }

  return sites;
}

/**
 * Formatted V8 stack text for the frames below `entry`, using Node's default
 * formatter rather than any installed `prepareStackTrace` hook.
 */
export function captureStackText(limit: number, entry: StackEntry): string {
  const previousPrepare = Error.prepareStackTrace;
  const previousLimit = Error.stackTraceLimit;

  try {
    Error.stackTraceLimit = limit;
    Error.prepareStackTrace = undefined;
    const holder: { stack?: string } = {};
    Error.captureStackTrace(holder, entry);
    return holder.stack ?? '';
  } finally {
    Error.prepareStackTrace = previousPrepare;
    Error.stackTraceLimit = previousLimit;
  }
}

/**
 * Display name V8 would print for a call site: `new Ctor`, `Type.method` or `fn`.
 */
export function describeCallSite(site: NodeJS.CallSite): string | undefined {
  const functionName = site.getFunctionName() || undefined;

  if (site.isConstructor()) {
    return `new ${functionName ?? '<anonymous>'}`;
  }

  if (!site.isToplevel()) {
    const typeName = site.getTypeName() || undefined;
    const method = functionName ?? (site.getMethodName() || undefined);
    if (typeName && method) {
      return method.startsWith(`${typeName}.`) ? method : `${typeName}.${method}`;
    }
    return method;
  }

  return functionName;
}

export function callSiteSupported(): boolean {
  return typeof Error.captureStackTrace === 'function';
}
