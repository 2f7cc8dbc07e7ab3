/**
 * TurtleParser — Optional RDF capability used to derive contexts from Turtle.
 *
 * Only namespace bindings are collected; triples are parsed and dropped.
 */

import { Parser } from 'n3';

export interface NamespaceBinding {
  prefix: string;
  iri: string;
}

export interface TurtleParser {
  parseNamespaces(source: string): Promise<NamespaceBinding[]>;
}

/**
 * Turtle parser backed by n3.
 */
export function createN3TurtleParser(): TurtleParser {
  return {
    parseNamespaces(source: string): Promise<NamespaceBinding[]> {
      return new Promise((resolve, reject) => {
        const bindings: NamespaceBinding[] = [];
        const parser = new Parser({ format: 'text/turtle' });
        parser.parse(
          source,
          (error, quad) => {
            if (error) {
              reject(error);
              return;
            }
            if (!quad) {
              resolve(bindings);
            }
          },
          (prefix, prefixNode) => {
            bindings.push({ prefix, iri: prefixNode.value });
          }
        );
      });
    },
  };
}
