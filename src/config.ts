import { readFile } from "node:fs/promises";
import { join } from "node:path";
import yaml from "js-yaml";
import * as z from "zod";
import { ConfigError } from "./utils/errors.js";

export const CONFIG_FILENAME = "orgsite.yaml";

const ConfigSchema = z.object({
  site_url: z
    .string()
    .url()
    .transform((url) => url.replace(/\/+$/, "")),
  exclude: z.array(z.string()).default([]),
});

/**
 * Site configuration, read from `orgsite.yaml` at the source root.
 */
export interface SiteConfig {
  /** Base URL without a trailing slash */
  siteUrl: string;
  /** Relative path prefixes never processed */
  exclude: string[];
}

/**
 * Validate an already-parsed configuration value.
 */
export function parseConfig(value: unknown, origin: string = CONFIG_FILENAME): SiteConfig {
  const result = ConfigSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid ${origin}: ${issues}`);
  }

  return { siteUrl: result.data.site_url, exclude: result.data.exclude };
}

/**
 * Load and validate `orgsite.yaml` from the source directory.
 */
export async function loadConfig(sourceDir: string): Promise<SiteConfig> {
  const path = join(sourceDir, CONFIG_FILENAME);

  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    throw new ConfigError(
      `Cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  let value: unknown;
  try {
    value = yaml.load(text);
  } catch (error) {
    throw new ConfigError(
      `Cannot parse ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  return parseConfig(value, path);
}
