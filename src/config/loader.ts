/**
 * Config loader — parses config/schemodel.md for model-building defaults.
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import {
  DEFAULT_SCHEMODEL_CONFIG,
  EXTRA_MODES,
  type ExtraMode,
  type SchemodelConfig,
} from "../types/config.ts";

/** Load config from <projectPath>/config/schemodel.md, falling back to defaults */
export async function loadConfig(projectPath: string): Promise<SchemodelConfig> {
  let content: string;
  try {
    content = await readFile(
      join(projectPath, "config", "schemodel.md"),
      "utf-8",
    );
  } catch (err) {
    if (isMissingFile(err)) return defaultConfig();
    throw err;
  }
  return parseConfig(content);
}

/** Extract settings from markdown content */
export function parseConfig(content: string): SchemodelConfig {
  const config = defaultConfig();

  const extraMatch = content.match(/\*\*Extra fields:\*\*\s*(\w+)/i);
  const extra = extraMatch?.[1]?.toLowerCase();
  if (isExtraMode(extra)) {
    config.model.extra = extra;
  }

  const frozenMatch = content.match(/\*\*Frozen:\*\*\s*(\w+)/i);
  if (frozenMatch?.[1]) {
    config.model.frozen = /^(yes|true|on)$/i.test(frozenMatch[1]);
  }

  const moduleMatch = content.match(/\*\*Module:\*\*\s*(\S+)/i);
  if (moduleMatch?.[1]) {
    config.module = moduleMatch[1].trim();
  }

  return config;
}

function defaultConfig(): SchemodelConfig {
  return {
    ...DEFAULT_SCHEMODEL_CONFIG,
    model: { ...DEFAULT_SCHEMODEL_CONFIG.model },
  };
}

function isExtraMode(value: string | undefined): value is ExtraMode {
  return EXTRA_MODES.some((mode) => mode === value);
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
