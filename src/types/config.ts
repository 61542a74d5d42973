/**
 * User-facing ClassificationOptions and internal ClassificationConfig types.
 */

/** Attribute names, or a rename map of attribute name → tag/field key. */
export type KeySelection = readonly string[] | Readonly<Record<string, string>>;

export interface ClassificationOptions {
  /** Replaces the logger-derived measurement name. */
  measurement?: string;
  includeTags?: KeySelection;
  includeFields?: KeySelection;
  excludeTags?: readonly string[];
  excludeFields?: readonly string[];
  /** Emit unlisted attributes as tags. Default false. */
  extraTags?: boolean;
  /** Emit unlisted attributes as fields. Default true. */
  extraFields?: boolean;
  includeStacktrace?: boolean;
  debuggingFields?: boolean;
  /** Symbolic level names ("ERROR") instead of syslog codes ("3"). */
  levelNames?: boolean;
  /** Source host, emitted as the `host` field. */
  localname?: string;
  hierarchyDelimiter?: string;
  measurementDelimiter?: string;
}

/**
 * Compiled once at handler construction; frozen for the handler's lifetime.
 */
export interface ClassificationConfig {
  readonly measurement: string | undefined;
  readonly includeTags: ReadonlyMap<string, string>;
  readonly includeFields: ReadonlyMap<string, string>;
  readonly excludeTags: ReadonlySet<string>;
  readonly excludeFields: ReadonlySet<string>;
  readonly extraTags: boolean;
  readonly extraFields: boolean;
  readonly includeStacktrace: boolean;
  readonly debuggingFields: boolean;
  readonly levelNames: boolean;
  readonly localname: string | undefined;
  readonly hierarchyDelimiter: string;
  readonly measurementDelimiter: string;
}
