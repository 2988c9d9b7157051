import { callSiteSupported, captureCallSites, describeCallSite } from './call-sites.js';
import { normalizeScriptName } from './script-table.js';

const UNKNOWN = 'unknown';

/**
 * A point in source text, usually a call site.
 *
 * `SourceLocation.current()` with no arguments describes the code that called it.
 * Where V8 call sites are unavailable the omitted fields fall back to
 * `'unknown'` / `0` instead of failing.
 */
export class SourceLocation {
  private constructor(
    readonly file: string,
    readonly func: string,
    readonly line: number,
    readonly column: number,
  ) {}

  static current(file?: string, func?: string, line?: number, column?: number): SourceLocation {
    const needsSite = file === undefined || func === undefined || line === undefined || column === undefined;
    const site = needsSite && callSiteSupported() ? captureCallSites(1, SourceLocation.current)[0] : undefined;

    const siteFile = site?.getFileName() ?? undefined;
    return new SourceLocation(
      file ?? (siteFile ? normalizeScriptName(siteFile) : UNKNOWN),
      func ?? (site ? describeCallSite(site) : undefined) ?? UNKNOWN,
      line ?? site?.getLineNumber() ?? 0,
      column ?? site?.getColumnNumber() ?? 0,
    );
  }

  /**
   * Location of whoever called `entry`. Lets a helper that takes an optional
   * location default it to its own caller instead of itself.
   */
  static callerOf(entry: (...args: never[]) => unknown): SourceLocation {
    const site = callSiteSupported() ? captureCallSites(1, entry)[0] : undefined;
    return site ? SourceLocation.current(
      normalizeScriptName(site.getFileName() ?? UNKNOWN),
      describeCallSite(site) ?? UNKNOWN,
      site.getLineNumber() ?? 0,
      site.getColumnNumber() ?? 0,
    ) : SourceLocation.current(UNKNOWN, UNKNOWN, 0, 0);
  }

  toString(): string {
    return `${this.func} (${this.file}:${this.line}:${this.column})`;
  }
}
