/**
 * Built-in vocabularies and collision rules.
 *
 * Inline contexts only, so a registry built from these needs no network.
 */

import type { CollisionRule, VocabEntry, VocabEntryInput } from './types.js';
import { defineCollisionRule, defineVocabEntry } from './types.js';

const BUILTIN_VOCABULARIES: VocabEntryInput[] = [
  {
    prefix: 'schema',
    uris: {
      primary: 'https://schema.org/',
      alternates: ['http://schema.org/', 'https://schema.org', 'http://schema.org'],
    },
    context: {
      inline: {
        '@context': {
          name: 'http://schema.org/name',
          Person: 'http://schema.org/Person',
          Organization: 'http://schema.org/Organization',
        },
      },
    },
    versions: { current: 'latest', supported: ['latest'] },
    features: ['inline_context', 'basic_types'],
    tags: ['general', 'semantic_web'],
  },
  {
    prefix: 'bioschemas',
    uris: {
      primary: 'https://bioschemas.org/',
      alternates: ['http://bioschemas.org/'],
    },
    context: {
      inline: {
        '@context': {
          name: 'http://schema.org/name',
          identifier: 'http://schema.org/identifier',
          Protein: 'https://bioschemas.org/Protein',
          Gene: 'https://bioschemas.org/Gene',
          hasSequence: 'https://bioschemas.org/hasSequence',
        },
      },
    },
    versions: { current: 'latest', supported: ['latest'] },
    features: ['biological', 'structured_data', 'schema_extension'],
    tags: ['biology', 'life_sciences', 'schema_org'],
    meta: { extends: 'schema' },
  },
];

const BUILTIN_COLLISION_RULES = [
  {
    pair: ['schema', 'bioschemas'],
    strategy: 'nested_contexts',
    details: { outer: 'schema', inner: 'bioschemas' },
  },
];

export function builtinVocabularies(): VocabEntry[] {
  return BUILTIN_VOCABULARIES.map((input, index) => defineVocabEntry(input, `builtins[${index}]`));
}

export function builtinCollisionRules(): CollisionRule[] {
  return BUILTIN_COLLISION_RULES.map((input, index) => defineCollisionRule(input, `builtinRules[${index}]`));
}
