/**
 * Depth-first search over GenericXmlNode trees.
 *
 * Pre-order, document order. Iterative so that deeply nested documents
 * cannot exhaust the call stack.
 */

import type { GenericXmlNode } from '@nfse-reader/contracts';
import type { SearchOptions } from '../types.js';

/**
 * Compare an element's local name with an alias
 */
export function namesMatch(localName: string, alias: string, caseSensitive: boolean): boolean {
  return caseSensitive ? localName === alias : localName.toLowerCase() === alias.toLowerCase();
}

function isSkipped(node: GenericXmlNode, options: SearchOptions): boolean {
  return (options.skipWithin ?? []).some((name) => namesMatch(node.localName, name, options.caseSensitive));
}

/**
 * What a visitor wants next: go on into the node's children, pass over
 * them, or end the walk.
 */
type Step = 'descend' | 'prune' | 'stop';

/**
 * Visit nodes in pre-order until `visit` says stop.
 * Nodes named in `skipWithin` are pruned with their subtree; `root` never is.
 */
function walk(root: GenericXmlNode, options: SearchOptions, visit: (node: GenericXmlNode) => Step): void {
  const stack: GenericXmlNode[] = [root];

  while (stack.length > 0) {
    const node = stack.pop();
    if (node === undefined) break;

    if (node !== root && isSkipped(node, options)) {
      continue;
    }
    const step = visit(node);
    if (step === 'stop') {
      return;
    }
    if (step === 'prune') {
      continue;
    }

    // Reverse push keeps document order on pop
    for (let i = node.children.length - 1; i >= 0; i--) {
      const child = node.children[i];
      if (child !== undefined) stack.push(child);
    }
  }
}

function matches(node: GenericXmlNode, name: string, options: SearchOptions): boolean {
  return namesMatch(node.localName, name, options.caseSensitive) && (options.accept?.(node) ?? true);
}

/**
 * First node named `name` (the root included), or undefined
 */
export function findFirst(root: GenericXmlNode, name: string, options: SearchOptions): GenericXmlNode | undefined {
  let found: GenericXmlNode | undefined;
  walk(root, options, (node) => {
    if (matches(node, name, options)) {
      found = node;
      return 'stop';
    }
    return 'descend';
  });
  return found;
}

/**
 * Every node named `name`, in document order
 */
export function findAll(root: GenericXmlNode, name: string, options: SearchOptions): GenericXmlNode[] {
  const found: GenericXmlNode[] = [];
  walk(root, options, (node) => {
    if (matches(node, name, options)) {
      found.push(node);
    }
    return 'descend';
  });
  return found;
}

/**
 * Every node named `name` that has no ancestor of the same name, in
 * document order
 */
export function findOutermost(root: GenericXmlNode, name: string, options: SearchOptions): GenericXmlNode[] {
  const found: GenericXmlNode[] = [];
  walk(root, options, (node) => {
    if (matches(node, name, options)) {
      found.push(node);
      return 'prune';
    }
    return 'descend';
  });
  return found;
}

/**
 * Resolve an ordered alias list: the first alias with any match wins,
 * whatever the document order of the matches.
 */
export function findByAliases(
  root: GenericXmlNode,
  aliases: readonly string[],
  options: SearchOptions,
): { node: GenericXmlNode; alias: string } | undefined {
  for (const alias of aliases) {
    const node = findFirst(root, alias, options);
    if (node !== undefined) {
      return { node, alias };
    }
  }
  return undefined;
}
