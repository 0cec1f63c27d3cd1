/**
 * CLI settings: built-in defaults, an optional JSON config file, and flags.
 *
 * Precedence is flags > config file > defaults. Layers are merged the way
 * saved settings are merged over `DEFAULT_SETTINGS`, except that a key a
 * layer leaves undefined does not clear the value beneath it.
 *
 * @module cli/config
 */
import { dirname, resolve } from 'path';
import { z } from 'zod';
import { ConfigError } from '../errors';
import { readTextFile } from './io';

export interface CliSettings {
  /** Numbering style for `add_numbers`. */
  style?: string;
  /** HTML style template. */
  theme: string;
  /** DOCX template path. */
  template?: string;
  /** Leave `#` lines inside fenced code blocks alone. */
  ignoreCodeBlocks: boolean;
  /** Enable GitHub Flavored Markdown. */
  gfm: boolean;
  /** Output document title. */
  title?: string;
}

export const DEFAULT_SETTINGS: CliSettings = {
  theme: 'minimal',
  ignoreCodeBlocks: false,
  gfm: true,
};

export const ConfigFileSchema = z
  .object({
    style: z.string().min(1).optional(),
    theme: z.enum(['minimal', 'enhanced', 'document']).optional(),
    template: z.string().min(1).optional(),
    ignoreCodeBlocks: z.boolean().optional(),
    gfm: z.boolean().optional(),
    title: z.string().optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Read and validate a JSON config file. A relative `template` path is
 * resolved against the config file's directory.
 *
 * @throws {ConfigError} When the file is not JSON or fails the schema.
 */
export async function loadConfigFile(filePath: string): Promise<ConfigFile> {
  const text = await readTextFile(filePath);

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(filePath, reason);
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(filePath, formatIssues(parsed.error));
  }

  const config = parsed.data;
  if (config.template) {
    return { ...config, template: resolve(dirname(filePath), config.template) };
  }
  return config;
}

/** Merge setting layers over the defaults, later layers winning. */
export function mergeSettings(...layers: Partial<CliSettings>[]): CliSettings {
  const merged: CliSettings = { ...DEFAULT_SETTINGS };
  for (const layer of layers) {
    if (layer.style !== undefined) merged.style = layer.style;
    if (layer.theme !== undefined) merged.theme = layer.theme;
    if (layer.template !== undefined) merged.template = layer.template;
    if (layer.ignoreCodeBlocks !== undefined) merged.ignoreCodeBlocks = layer.ignoreCodeBlocks;
    if (layer.gfm !== undefined) merged.gfm = layer.gfm;
    if (layer.title !== undefined) merged.title = layer.title;
  }
  return merged;
}
