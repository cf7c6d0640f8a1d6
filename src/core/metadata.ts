/**
 * Frontmatter metadata resolver.
 *
 * Frontmatter is read as YAML first and as TOML only when YAML fails, so a
 * block that happens to be valid in both formats always takes its YAML
 * meaning.
 *
 * @module core/metadata
 */
import {
  isAlias,
  isMap,
  isScalar,
  isSeq,
  parseDocument,
  type Document as YamlDocument,
} from 'yaml';
import * as TOML from '@iarna/toml';
import type { Metadata, MetaObject, MetaValue } from './types';
import { MetadataError } from './errors';
import { silentLogger, type Logger } from './logger';

/** Frontmatter format a block was resolved as. */
export type MetadataFormat = 'yaml' | 'toml';

/**
 * Options for {@link resolveMetadata}.
 */
export interface MetadataOptions {
  /**
   * Raise a {@link MetadataError} instead of converting non-string keys and
   * unrepresentable values to `""`.
   * @default false
   */
  strict?: boolean;

  /** @default silentLogger */
  logger?: Logger;
}

/** Metadata together with the format it was read as. */
export interface ResolvedMetadata {
  format: MetadataFormat;
  metadata: Metadata;
}

// ---------------------------------------------------------------------------
// Lossy conversion
// ---------------------------------------------------------------------------

/** Collects lossy conversions or rejects them, depending on the options. */
class Conversion {
  readonly lossy: string[] = [];

  constructor(private readonly strict: boolean) {}

  fallback(what: string): string {
    if (this.strict) {
      throw new MetadataError(`Unsupported metadata value: ${what}`);
    }
    this.lossy.push(what);
    return '';
  }
}

function entriesToObject(entries: Array<[string, MetaValue]>): MetaObject {
  // fromEntries defines own properties, so keys such as "__proto__" stay data.
  return Object.fromEntries(entries);
}

// ---------------------------------------------------------------------------
// YAML
// ---------------------------------------------------------------------------

function convertYamlNode(
  node: unknown,
  doc: YamlDocument,
  ancestors: ReadonlySet<unknown>,
  conversion: Conversion,
): MetaValue {
  if (isAlias(node)) {
    const target = node.resolve(doc);
    if (!target || ancestors.has(target)) {
      return conversion.fallback(`alias *${node.source}`);
    }
    return convertYamlNode(target, doc, ancestors, conversion);
  }

  if (isScalar(node)) {
    return convertScalar(node.value, conversion);
  }

  const nested = new Set(ancestors).add(node);

  if (isSeq(node)) {
    return node.items.map((item) => convertYamlNode(item, doc, nested, conversion));
  }

  if (isMap(node)) {
    const entries: Array<[string, MetaValue]> = [];
    for (const pair of node.items) {
      const keyValue = isScalar(pair.key) ? pair.key.value : pair.key;
      const key =
        typeof keyValue === 'string'
          ? keyValue
          : conversion.fallback(`non-string key ${String(keyValue)}`);
      entries.push([key, convertYamlNode(pair.value, doc, nested, conversion)]);
    }
    return entriesToObject(entries);
  }

  return conversion.fallback(String(node));
}

function convertScalar(value: unknown, conversion: Conversion): MetaValue {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'bigint') {
    return Number(value);
  }
  return conversion.fallback(value === null ? 'null' : String(value));
}

/**
 * Try to read `text` as a YAML mapping.
 *
 * @returns The converted mapping, or `undefined` when `text` is not a valid
 *   YAML mapping.
 */
function tryYaml(text: string, conversion: Conversion): Metadata | undefined {
  const doc = parseDocument(text);
  if (doc.errors.length > 0 || !isMap(doc.contents)) {
    return undefined;
  }
  const value = convertYamlNode(doc.contents, doc, new Set(), conversion);
  return isMetaObject(value) ? value : undefined;
}

// ---------------------------------------------------------------------------
// TOML
// ---------------------------------------------------------------------------

function isMetaObject(value: MetaValue): value is MetaObject {
  return typeof value === 'object' && !Array.isArray(value);
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function convertTomlValue(value: unknown, conversion: Conversion): MetaValue {
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => convertTomlValue(item, conversion));
  }
  if (isPlainRecord(value)) {
    return entriesToObject(
      Object.entries(value).map(([key, item]): [string, MetaValue] => [
        key,
        convertTomlValue(item, conversion),
      ]),
    );
  }
  return convertScalar(value, conversion);
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Resolve frontmatter text and report which format it was read as.
 *
 * @throws {MetadataError} When the text is neither a YAML mapping nor valid
 *   TOML, or (in strict mode) when a value cannot be represented.
 */
export function resolveMetadataWithFormat(
  text: string,
  options?: MetadataOptions,
): ResolvedMetadata {
  const strict = options?.strict ?? false;
  const logger = options?.logger ?? silentLogger;

  const yamlConversion = new Conversion(strict);
  const fromYaml = tryYaml(text, yamlConversion);
  if (fromYaml) {
    reportLossy(logger, 'yaml', yamlConversion);
    return { format: 'yaml', metadata: fromYaml };
  }
  logger.debug('frontmatter is not a YAML mapping, trying TOML');

  let parsed: unknown;
  try {
    parsed = TOML.parse(text);
  } catch (err) {
    throw new MetadataError(`Failed to parse metadata as YAML or TOML: ${describeError(err)}`);
  }

  const tomlConversion = new Conversion(strict);
  const value = convertTomlValue(parsed, tomlConversion);
  if (!isMetaObject(value)) {
    throw new MetadataError('Failed to parse metadata as YAML or TOML: not a table');
  }
  reportLossy(logger, 'toml', tomlConversion);
  return { format: 'toml', metadata: value };
}

/**
 * Resolve the text between two frontmatter delimiters into metadata.
 *
 * Non-string keys and values with no metadata counterpart (YAML `null`,
 * cyclic aliases) become `""` unless `options.strict` is set.
 *
 * @example
 * ```ts
 * resolveMetadata('title: Notes\ntags:\n  - draft\n');
 * // { title: 'Notes', tags: ['draft'] }
 * ```
 */
export function resolveMetadata(text: string, options?: MetadataOptions): Metadata {
  return resolveMetadataWithFormat(text, options).metadata;
}

function reportLossy(logger: Logger, format: MetadataFormat, conversion: Conversion): void {
  if (conversion.lossy.length > 0) {
    logger.debug(`lossy ${format} metadata conversion`, conversion.lossy);
  }
}
