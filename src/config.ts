import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { MANIFEST_KIND_IDS, type ManifestKindId } from "./manifest/index.js";

export const DEFAULT_CONFIG_FILE = "recent.config.yaml";

const ConfigSchema = z
  .object({
    manifests: z
      .array(z.enum(MANIFEST_KIND_IDS))
      .nonempty()
      .refine((ids) => new Set(ids).size === ids.length, { message: "duplicate manifest kind" })
      .optional(),
    include: z.array(z.string().min(1)).optional(),
    exclude: z.array(z.string().min(1)).optional(),
    tools: z
      .object({
        cargo: z.string().min(1).optional(),
        npm: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type RecentConfig = {
  /** Precedence order when one directory holds several manifests. */
  manifests: ManifestKindId[];
  /** Replaces the manifest kinds' default globs when non-empty. */
  include: string[];
  exclude: string[];
  tools: Partial<Record<ManifestKindId, string>>;
  /** Where the config came from, if a file was read. */
  source: string | null;
};

export function defaultConfig(): RecentConfig {
  return { manifests: [...MANIFEST_KIND_IDS], include: [], exclude: [], tools: {}, source: null };
}

export function parseConfig(raw: string, source: string): RecentConfig {
  let doc: unknown;
  try {
    doc = yaml.load(raw);
  } catch (e) {
    throw new ConfigError(`Invalid YAML in ${source}: ${e instanceof Error ? e.message : String(e)}`, e);
  }
  // an empty file is an empty config
  if (doc === undefined || doc === null) return { ...defaultConfig(), source };

  const res = ConfigSchema.safeParse(doc);
  if (!res.success) {
    const issues = res.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ConfigError(`Invalid config ${source}:\n  ${issues.join("\n  ")}`, res.error);
  }

  const defaults = defaultConfig();
  return {
    manifests: res.data.manifests ?? defaults.manifests,
    include: res.data.include ?? defaults.include,
    exclude: res.data.exclude ?? defaults.exclude,
    tools: res.data.tools ?? defaults.tools,
    source,
  };
}

/**
 * An explicit `configPath` must exist. Without one, `recent.config.yaml` at
 * the repository root is used when present.
 */
export function loadConfig(repoRoot: string, configPath?: string): RecentConfig {
  if (configPath) {
    const abs = path.resolve(configPath);
    if (!fs.existsSync(abs)) {
      throw new ConfigError(`Config not found: ${abs}`);
    }
    return parseConfig(fs.readFileSync(abs, "utf8"), abs);
  }

  const fallback = path.join(repoRoot, DEFAULT_CONFIG_FILE);
  if (!fs.existsSync(fallback)) return defaultConfig();
  return parseConfig(fs.readFileSync(fallback, "utf8"), fallback);
}
