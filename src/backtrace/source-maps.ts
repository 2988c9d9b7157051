import { readFile } from 'fs/promises';
import { createRequire } from 'module';
import path from 'path';
import { fileURLToPath } from 'url';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { SourceMapConsumer } from 'source-map';
import type { RawSourceMap } from 'source-map';
import { z } from 'zod';
import type { Logger } from '../core/logging/index.js';
import type { SourceMapLoadFailedError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';
import { normalizeScriptName } from './script-table.js';

export interface OriginalPosition {
  readonly source: string;
  readonly line: number;
  readonly column: number;
}

export type SourceMapLoadResult = Result<boolean, SourceMapLoadFailedError>;

const RawSourceMapSchema = z.object({
  version: z.number().int(),
  file: z.string().optional(),
  sourceRoot: z.string().optional(),
  sources: z.array(z.string()),
  sourcesContent: z.array(z.string().nullable()).optional(),
  names: z.array(z.string()),
  mappings: z.string(),
});

const SOURCE_MAPPING_URL = /^\s*\/\/[#@]\s*sourceMappingURL=(\S+)\s*$/gm;

/**
 * Source maps, loaded ahead of time.
 *
 * `source-map` consumers are built asynchronously (wasm), but a crash report
 * cannot await. Everything async happens in `register`/`loadForScript`; `lookup`
 * is a synchronous query against consumers that already exist.
 */
export class SourceMapRegistry {
  private readonly consumers = new Map<string, SourceMapConsumer>();

  constructor(private readonly logger: Logger) {}

  async register(script: string, raw: unknown): Promise<SourceMapLoadResult> {
    const name = normalizeScriptName(script);
    const parsed = RawSourceMapSchema.safeParse(typeof raw === 'string' ? safeJsonParse(raw) : raw);
    if (!parsed.success) {
      return this.fail(Err.sourceMapLoadFailed(name, 'not a source map (version 3, no index maps)', parsed.error));
    }

    const initialized = await ensureMappingsWasm();
    if (initialized.isErr()) {
      return this.fail(Err.sourceMapLoadFailed(name, 'mappings.wasm could not be loaded', initialized.error));
    }

    try {
      const consumer = await new SourceMapConsumer(toRawSourceMap(parsed.data));
      this.consumers.get(name)?.destroy();
      this.consumers.set(name, consumer);
      this.logger.debug({ script: name, sources: parsed.data.sources.length }, 'Registered source map');
      return ok(true);
    } catch (error) {
      return this.fail(Err.sourceMapLoadFailed(name, 'source map could not be decoded', error));
    }
  }

  /**
   * Follow the script's `//# sourceMappingURL=` comment (inline `data:` URI or a
   * path relative to the script). `ok(false)` when the script has no comment.
   */
  async loadForScript(scriptPath: string): Promise<SourceMapLoadResult> {
    const script = normalizeScriptName(scriptPath);

    let source: string;
    try {
      source = await readFile(script, 'utf8');
    } catch (error) {
      return this.fail(Err.sourceMapLoadFailed(script, 'script could not be read', error));
    }

    const url = lastSourceMappingUrl(source);
    if (url === undefined) return ok(false);

    if (url.startsWith('data:')) {
      const inline = decodeDataUri(url);
      if (inline === undefined) {
        return this.fail(Err.sourceMapLoadFailed(script, 'unsupported inline source map encoding'));
      }
      return this.register(script, inline);
    }

    const mapPath = url.startsWith('file://') ? fileURLToPath(url) : path.resolve(path.dirname(script), url);
    try {
      return this.register(script, await readFile(mapPath, 'utf8'));
    } catch (error) {
      return this.fail(Err.sourceMapLoadFailed(script, `${mapPath} could not be read`, error));
    }
  }

  /** Original position for a 1-based generated line/column, if a map covers it. */
  lookup(script: string, line: number, column: number): OriginalPosition | undefined {
    const consumer = this.consumers.get(script);
    if (!consumer) return undefined;

    const original = consumer.originalPositionFor({ line, column: Math.max(0, column - 1) });
    if (original.source === null || original.line === null || original.column === null) {
      return undefined;
    }
    return { source: original.source, line: original.line, column: original.column + 1 };
  }

  has(script: string): boolean {
    return this.consumers.has(normalizeScriptName(script));
  }

  dispose(): void {
    for (const consumer of this.consumers.values()) {
      consumer.destroy();
    }
    this.consumers.clear();
  }

  private fail(error: SourceMapLoadFailedError): SourceMapLoadResult {
    this.logger.warn({ script: error.script, err: error.cause }, error.message);
    return err(error);
  }
}

// =============================================================================
// Internal
// =============================================================================

let mappingsWasm: Promise<Result<void, unknown>> | null = null;

/**
 * source-map picks its "browser" wasm loader whenever `fetch` exists, which it
 * does on Node 18+. Hand it the wasm bytes from the installed package instead.
 */
function ensureMappingsWasm(): Promise<Result<void, unknown>> {
  if (!mappingsWasm) {
    mappingsWasm = loadMappingsWasm().then((result) => {
      if (result.isErr()) mappingsWasm = null;
      return result;
    });
  }
  return mappingsWasm;
}

async function loadMappingsWasm(): Promise<Result<void, unknown>> {
  try {
    const require = createRequire(import.meta.url);
    const bytes = await readFile(require.resolve('source-map/lib/mappings.wasm'));
    const wasm = new ArrayBuffer(bytes.byteLength);
    new Uint8Array(wasm).set(bytes);
    SourceMapConsumer.initialize({ 'lib/mappings.wasm': wasm });
    return ok(undefined);
  } catch (error) {
    return err(error);
  }
}

function toRawSourceMap(data: z.infer<typeof RawSourceMapSchema>): RawSourceMap {
  return {
    version: data.version,
    file: data.file ?? '',
    sourceRoot: data.sourceRoot,
    sources: data.sources,
    sourcesContent: data.sourcesContent?.map((content) => content ?? ''),
    names: data.names,
    mappings: data.mappings,
  };
}

function lastSourceMappingUrl(source: string): string | undefined {
  let url: string | undefined;
  for (const match of source.matchAll(SOURCE_MAPPING_URL)) {
    url = match[1];
  }
  return url;
}

function decodeDataUri(uri: string): string | undefined {
  const comma = uri.indexOf(',');
  if (comma === -1) return undefined;
  const header = uri.slice('data:'.length, comma);
  const payload = uri.slice(comma + 1);

  if (!header.startsWith('application/json')) return undefined;
  if (header.endsWith(';base64')) return Buffer.from(payload, 'base64').toString('utf8');
  try {
    return decodeURIComponent(payload);
  } catch {
    return undefined;
  }
}

function safeJsonParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
