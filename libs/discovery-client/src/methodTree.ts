import type { InterfaceDocument, MethodNode, ResourceNode } from './document';
import { MethodNotFoundError } from './errors';

export interface ResolvedMethod {
  service: string;
  version: string;
  /** Dot path as requested, e.g. `projects.widgets.list`. */
  dotPath: string;
  /** Final path segment, e.g. `list`. */
  name: string;
  method: MethodNode;
  document: InterfaceDocument;
}

/**
 * Walks `resources` for every segment but the last, then looks the last
 * segment up in `methods`.
 */
export function findMethod(document: InterfaceDocument, dotPath: string): MethodNode {
  const segments = dotPath.split('.').filter((segment) => segment.length > 0);
  if (segments.length === 0) {
    throw new MethodNotFoundError(dotPath, '', nextSegments(document, true));
  }

  const methodName = segments[segments.length - 1];
  let node: ResourceNode = document;
  for (const segment of segments.slice(0, -1)) {
    const child = ownEntry(node.resources, segment);
    if (!child) {
      throw new MethodNotFoundError(dotPath, segment, nextSegments(node, false));
    }
    node = child;
  }

  const method = ownEntry(node.methods, methodName);
  if (!method) {
    throw new MethodNotFoundError(dotPath, methodName, nextSegments(node, true));
  }
  return method;
}

export function resolveMethod(document: InterfaceDocument, dotPath: string): ResolvedMethod {
  const method = findMethod(document, dotPath);
  const segments = dotPath.split('.').filter((segment) => segment.length > 0);
  return {
    service: document.name,
    version: document.version,
    dotPath: segments.join('.'),
    name: segments[segments.length - 1],
    method,
    document,
  };
}

/**
 * Every method dot path in the document, sorted.
 */
export function listMethods(document: InterfaceDocument): string[] {
  const paths: string[] = [];
  const visit = (node: ResourceNode, prefix: string[]) => {
    for (const name of Object.keys(node.methods ?? {})) {
      paths.push([...prefix, name].join('.'));
    }
    for (const [name, child] of Object.entries(node.resources ?? {})) {
      visit(child, [...prefix, name]);
    }
  };
  visit(document, []);
  return paths.sort();
}

function nextSegments(node: ResourceNode, includeMethods: boolean): string[] {
  const resources = Object.keys(node.resources ?? {});
  const methods = includeMethods ? Object.keys(node.methods ?? {}) : [];
  return [...resources, ...methods].sort();
}

function ownEntry<T>(record: Record<string, T> | undefined, key: string): T | undefined {
  return record && Object.hasOwn(record, key) ? record[key] : undefined;
}
