/**
 * Configuration for an extraction run.
 *
 * Values resolve from DEFAULT_CONFIG, then an optional blockgraph.toml at the
 * collection root, then explicit overrides (usually CLI flags).
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import * as toml from "toml";
import { ConfigError } from "./models.js";

/** Config file name, looked up in the collection root */
export const CONFIG_FILE = "blockgraph.toml";

/** Environment variable naming the collection root */
export const ROOT_ENV = "BLOCKGRAPH_ROOT";

/**
 * Property keys that also set first-class attributes.
 */
export interface ReservedKeys {
  public: string;
  tags: string;
  heading: string;
  id: string;
}

export interface GraphConfig {
  /** Absolute path of the note collection */
  root: string;
  /** Separator between namespace segments of a page name */
  namespaceSeparator: string;
  /** Upper-case `#+BEGIN_X` wrapper names */
  directives: string[];
  /** Upper-case task markers read from the start of a block */
  markers: string[];
  reservedKeys: ReservedKeys;
  /** Spaces counted as one indentation level */
  indentWidth: number;
  /** Note file extensions, with leading dot */
  extensions: string[];
  /** Top-level directories whose name is not part of the page name */
  pageDirs: string[];
  /** Extra glob patterns to skip, relative to root */
  ignore: string[];
  /** Upper bound on notes read and parsed at once */
  concurrency: number;
}

export const DEFAULT_DIRECTIVES = [
  "QUOTE",
  "QUERY",
  "NOTE",
  "TIP",
  "IMPORTANT",
  "CAUTION",
  "WARNING",
  "PINNED",
  "CENTER",
  "EXAMPLE",
  "EXPORT",
  "VERSE",
  "COMMENT",
  "SRC",
];

export const DEFAULT_MARKERS = [
  "TODO",
  "DOING",
  "DONE",
  "LATER",
  "NOW",
  "WAITING",
  "CANCELED",
  "CANCELLED",
  "IN-PROGRESS",
];

/**
 * Default configuration values. `root` is filled in by resolveConfig.
 */
export const DEFAULT_CONFIG: Omit<GraphConfig, "root"> = {
  namespaceSeparator: "/",
  directives: DEFAULT_DIRECTIVES,
  markers: DEFAULT_MARKERS,
  reservedKeys: {
    public: "public",
    tags: "tags",
    heading: "heading",
    id: "id",
  },
  indentWidth: 2,
  extensions: [".md"],
  pageDirs: ["pages", "journals"],
  ignore: [],
  concurrency: Math.max(1, os.availableParallelism()),
};

export type ConfigOverrides = Partial<Omit<GraphConfig, "reservedKeys">> & {
  reservedKeys?: Partial<ReservedKeys>;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function expectString(key: string, value: unknown): string {
  if (typeof value !== "string" || value === "") {
    throw new ConfigError(`${CONFIG_FILE}: "${key}" must be a non-empty string`);
  }
  return value;
}

function expectStringList(key: string, value: unknown): string[] {
  if (!Array.isArray(value) || !value.every((v) => typeof v === "string")) {
    throw new ConfigError(`${CONFIG_FILE}: "${key}" must be a list of strings`);
  }
  return value.map(String);
}

function expectPositiveInt(key: string, value: unknown): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
    throw new ConfigError(`${CONFIG_FILE}: "${key}" must be a positive integer`);
  }
  return value;
}

/**
 * Map parsed TOML onto config overrides. Unknown keys are ignored.
 */
export function configFromToml(parsed: unknown): ConfigOverrides {
  if (!isRecord(parsed)) {
    return {};
  }

  const config: ConfigOverrides = {};

  if (parsed.namespace_separator !== undefined) {
    config.namespaceSeparator = expectString(
      "namespace_separator",
      parsed.namespace_separator,
    );
  }
  if (parsed.directives !== undefined) {
    config.directives = expectStringList("directives", parsed.directives).map(
      (d) => d.toUpperCase(),
    );
  }
  if (parsed.markers !== undefined) {
    config.markers = expectStringList("markers", parsed.markers).map((m) =>
      m.toUpperCase(),
    );
  }
  if (parsed.indent_width !== undefined) {
    config.indentWidth = expectPositiveInt("indent_width", parsed.indent_width);
  }
  if (parsed.extensions !== undefined) {
    config.extensions = expectStringList("extensions", parsed.extensions).map(
      (ext) => (ext.startsWith(".") ? ext : `.${ext}`),
    );
  }
  if (parsed.page_dirs !== undefined) {
    config.pageDirs = expectStringList("page_dirs", parsed.page_dirs);
  }
  if (parsed.ignore !== undefined) {
    config.ignore = expectStringList("ignore", parsed.ignore);
  }
  if (parsed.concurrency !== undefined) {
    config.concurrency = expectPositiveInt("concurrency", parsed.concurrency);
  }

  const reserved = parsed.reserved_keys;
  if (reserved !== undefined) {
    if (!isRecord(reserved)) {
      throw new ConfigError(`${CONFIG_FILE}: "reserved_keys" must be a table`);
    }
    const keys: Partial<ReservedKeys> = {};
    for (const name of ["public", "tags", "heading", "id"] as const) {
      if (reserved[name] !== undefined) {
        keys[name] = expectString(`reserved_keys.${name}`, reserved[name]);
      }
    }
    config.reservedKeys = keys;
  }

  return config;
}

/**
 * Read blockgraph.toml from the collection root, if present.
 */
export function loadConfigFile(root: string): ConfigOverrides {
  const configPath = path.join(root, CONFIG_FILE);
  if (!fs.existsSync(configPath)) {
    return {};
  }

  const content = fs.readFileSync(configPath, "utf-8");
  let parsed: unknown;
  try {
    parsed = toml.parse(content);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`${CONFIG_FILE}: ${message}`);
  }
  return configFromToml(parsed);
}

/**
 * Merge defaults, file values and overrides into a complete config.
 */
export function mergeConfig(
  root: string,
  ...layers: ConfigOverrides[]
): GraphConfig {
  let merged: GraphConfig = { ...DEFAULT_CONFIG, root: path.resolve(root) };

  for (const layer of layers) {
    merged = {
      root: layer.root ?? merged.root,
      namespaceSeparator: layer.namespaceSeparator ?? merged.namespaceSeparator,
      directives: layer.directives ?? merged.directives,
      markers: layer.markers ?? merged.markers,
      reservedKeys: { ...merged.reservedKeys, ...layer.reservedKeys },
      indentWidth: layer.indentWidth ?? merged.indentWidth,
      extensions: layer.extensions ?? merged.extensions,
      pageDirs: layer.pageDirs ?? merged.pageDirs,
      ignore: layer.ignore ?? merged.ignore,
      concurrency: layer.concurrency ?? merged.concurrency,
    };
  }

  merged.root = path.resolve(merged.root);
  merged.reservedKeys = {
    public: merged.reservedKeys.public.toLowerCase(),
    tags: merged.reservedKeys.tags.toLowerCase(),
    heading: merged.reservedKeys.heading.toLowerCase(),
    id: merged.reservedKeys.id.toLowerCase(),
  };
  return merged;
}

/**
 * Resolve the full configuration for a run.
 *
 * The root comes from `options.root`, then BLOCKGRAPH_ROOT, then the working
 * directory.
 */
export function resolveConfig(options: ConfigOverrides = {}): GraphConfig {
  const root = path.resolve(
    options.root ?? process.env[ROOT_ENV] ?? process.cwd(),
  );
  return mergeConfig(root, loadConfigFile(root), { ...options, root });
}
