/**
 * Tests for loading the bundled registry data file.
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { silentLogger } from '../logging.js';
import { InvalidConfigurationError } from './errors.js';
import { DEFAULT_REGISTRY_DATA_PATH, loadRegistryData, loadVocabRegistry } from './RegistryDataLoader.js';

describe('RegistryDataLoader', () => {
  let testDir: string;

  beforeAll(async () => {
    testDir = join(tmpdir(), `vocab-data-test-${randomUUID()}`);
    await mkdir(testDir, { recursive: true });
  });

  afterAll(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  async function writeData(name: string, data: unknown): Promise<string> {
    const path = join(testDir, name);
    await writeFile(path, typeof data === 'string' ? data : JSON.stringify(data));
    return path;
  }

  it('returns empty data for a missing file', async () => {
    expect(await loadRegistryData(join(testDir, 'absent.json'), silentLogger)).toEqual({
      vocabularies: [],
      collisionRules: [],
    });
  });

  it('parses vocabularies and rules', async () => {
    const path = await writeData('ok.json', {
      registryVersion: 1,
      vocabularies: [{ prefix: 'ex', context: { inline: { '@context': {} } }, tags: ['test'] }],
      collisionRules: [{ pair: ['ex', 'schema'], strategy: 'graph_partition' }],
    });

    const data = await loadRegistryData(path, silentLogger);
    expect(data.vocabularies.map((v) => v.prefix)).toEqual(['ex']);
    expect(data.vocabularies[0]?.tags.has('test')).toBe(true);
    expect(data.collisionRules).toEqual([{ pair: ['ex', 'schema'], strategy: 'graph_partition', details: {} }]);
  });

  it('rejects invalid JSON', async () => {
    const path = await writeData('broken.json', '{ nope');
    await expect(loadRegistryData(path, silentLogger)).rejects.toBeInstanceOf(InvalidConfigurationError);
  });

  it('rejects an unsupported registryVersion with the field path', async () => {
    const path = await writeData('v2.json', { registryVersion: 2 });
    await expect(loadRegistryData(path, silentLogger)).rejects.toMatchObject({
      code: 'INVALID_CONFIGURATION',
      path: `${path}#registryVersion`,
    });
  });

  it('reports the index of an invalid vocabulary', async () => {
    const path = await writeData('bad-entry.json', {
      registryVersion: 1,
      vocabularies: [{ prefix: 'ok', context: { inline: {} } }, { prefix: 'bad', context: {} }],
    });
    await expect(loadRegistryData(path, silentLogger)).rejects.toMatchObject({
      path: 'vocabularies[1].context',
    });
  });

  describe('loadVocabRegistry', () => {
    it('adds data-file entries after the built-ins', async () => {
      const path = await writeData('extra.json', {
        registryVersion: 1,
        vocabularies: [{ prefix: 'ex', context: { inline: {} } }],
        collisionRules: [{ pair: ['ex', 'schema'], strategy: 'graph_partition' }],
      });

      const { registry, resolver } = await loadVocabRegistry({ dataPath: path, logger: silentLogger });
      expect(registry.list().map((e) => e.prefix)).toEqual(['schema', 'bioschemas', 'ex']);
      expect((await resolver.choose('schema', 'ex')).strategy).toBe('graph_partition');
      expect((await resolver.choose('schema', 'bioschemas')).strategy).toBe('nested_contexts');
    });

    it('can leave the built-ins out', async () => {
      const { registry } = await loadVocabRegistry({
        dataPath: join(testDir, 'absent.json'),
        includeBuiltins: false,
        logger: silentLogger,
      });
      expect(registry.size).toBe(0);
    });

    it('loads the bundled data file', async () => {
      const { registry } = await loadVocabRegistry({ dataPath: DEFAULT_REGISTRY_DATA_PATH, logger: silentLogger });
      expect(registry.has('wikidata')).toBe(true);
      expect(registry.resolve('http://www.wikidata.org/entity/').prefix).toBe('wikidata');
      expect(registry.get('prov').context.mode).toBe('derivesFrom');
      expect(registry.get('codemeta').versions.current).toBe('3.0');
    });
  });
});
