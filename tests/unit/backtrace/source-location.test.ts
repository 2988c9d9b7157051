import { describe, expect, it } from 'vitest';
import { SourceLocation } from '../../../src/backtrace/source-location.js';

function whereAmI(): SourceLocation {
  return SourceLocation.current();
}

function reportFrom(location: SourceLocation = SourceLocation.callerOf(reportFrom)): SourceLocation {
  return location;
}

function failingCallSite(): SourceLocation {
  return reportFrom();
}

function withoutCallSites<T>(run: () => T): T {
  const capture = Error.captureStackTrace;
  Reflect.deleteProperty(Error, 'captureStackTrace');
  try {
    return run();
  } finally {
    Error.captureStackTrace = capture;
  }
}

describe('SourceLocation', () => {
  it('keeps explicit fields as given', () => {
    const location = SourceLocation.current('lib/option.ts', 'unwrap', 12, 4);

    expect(location).toMatchObject({ file: 'lib/option.ts', func: 'unwrap', line: 12, column: 4 });
    expect(location.toString()).toBe('unwrap (lib/option.ts:12:4)');
  });

  it('fills omitted fields from the calling code', () => {
    const location = whereAmI();

    expect(location.func).toBe('whereAmI');
    expect(location.file).toMatch(/source-location\.test\.ts$/);
    expect(location.line).toBeGreaterThan(0);
    expect(location.column).toBeGreaterThan(0);
  });

  it('fills only the fields that were omitted', () => {
    const location = SourceLocation.current('given.ts');

    expect(location.file).toBe('given.ts');
    expect(location.line).toBeGreaterThan(0);
  });

  it('describes the caller of a helper with callerOf', () => {
    const location = failingCallSite();

    expect(location.func).toBe('failingCallSite');
    expect(location.file).toMatch(/source-location\.test\.ts$/);
  });

  it('falls back to placeholders where call sites cannot be captured', () => {
    const [own, caller] = withoutCallSites(() => [whereAmI(), failingCallSite()]);

    expect(own).toMatchObject({ file: 'unknown', func: 'unknown', line: 0, column: 0 });
    expect(caller?.toString()).toBe('unknown (unknown:0:0)');
  });
});
