/**
 * RegistryDataLoader — Load the optional bundled vocabulary data file.
 *
 * File shape (JSON):
 *   { "registryVersion": 1, "vocabularies": [...], "collisionRules": [...] }
 *
 * A missing file is not an error: the registry falls back to its built-ins.
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { Logger } from '../logging.js';
import { builtinCollisionRules, builtinVocabularies } from './builtins.js';
import { CollisionResolver } from './CollisionResolver.js';
import { InvalidConfigurationError } from './errors.js';
import {
  defineCollisionRule,
  defineVocabEntry,
  type CollisionRule,
  type VocabEntry,
} from './types.js';
import { VocabRegistry, type VocabRegistryOptions } from './VocabRegistry.js';

/**
 * Default location of the bundled data file, relative to this module.
 */
export const DEFAULT_REGISTRY_DATA_PATH = fileURLToPath(
  new URL('../../data/registry-data.json', import.meta.url)
);

const RegistryDataFileSchema = z.object({
  registryVersion: z.literal(1),
  vocabularies: z.array(z.unknown()).default([]),
  collisionRules: z.array(z.unknown()).default([]),
});

export interface RegistryData {
  vocabularies: VocabEntry[];
  collisionRules: CollisionRule[];
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

/**
 * Read and validate a registry data file. Returns empty data when the file does not exist.
 */
export async function loadRegistryData(path: string, logger: Logger = console): Promise<RegistryData> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err) {
    if (isMissingFile(err)) {
      logger.debug(`Registry data file not found at ${path}, using built-in vocabularies only`);
      return { vocabularies: [], collisionRules: [] };
    }
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new InvalidConfigurationError(`not valid JSON: ${message}`, path);
  }

  const result = RegistryDataFileSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const issuePath = issue && issue.path.length > 0 ? `${path}#${issue.path.join('.')}` : path;
    throw new InvalidConfigurationError(issue?.message ?? 'invalid registry data', issuePath);
  }

  return {
    vocabularies: result.data.vocabularies.map((item, index) => defineVocabEntry(item, `vocabularies[${index}]`)),
    collisionRules: result.data.collisionRules.map((item, index) =>
      defineCollisionRule(item, `collisionRules[${index}]`)
    ),
  };
}

export interface LoadVocabRegistryOptions extends VocabRegistryOptions {
  /** Data file path; defaults to the bundled file */
  dataPath?: string;
  /** Include the built-in vocabularies and rules (default true) */
  includeBuiltins?: boolean;
  overlapCacheSize?: number;
}

export interface LoadedVocabulary {
  registry: VocabRegistry;
  resolver: CollisionResolver;
}

/**
 * Build a registry from built-ins plus the data file, and a resolver over it.
 * Data-file entries replace built-ins with the same prefix.
 */
export async function loadVocabRegistry(options: LoadVocabRegistryOptions = {}): Promise<LoadedVocabulary> {
  const logger = options.logger ?? console;
  const includeBuiltins = options.includeBuiltins ?? true;
  const data = await loadRegistryData(options.dataPath ?? DEFAULT_REGISTRY_DATA_PATH, logger);

  const entries = [...(includeBuiltins ? builtinVocabularies() : []), ...data.vocabularies];
  const rules = [...(includeBuiltins ? builtinCollisionRules() : []), ...data.collisionRules];

  const registry = new VocabRegistry(entries, { ...options, logger });
  const resolver = new CollisionResolver(registry, {
    rules,
    logger,
    ...(options.overlapCacheSize !== undefined ? { overlapCacheSize: options.overlapCacheSize } : {}),
  });

  logger.debug(`Loaded ${registry.size} vocabularies and ${rules.length} collision rules`);
  return { registry, resolver };
}
