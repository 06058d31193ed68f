import { readEngineConfig, type CallBuilder, type DocumentSource, type InterfaceDocument } from '@discovery-engine/discovery-client';
import { TypeGraphWalker, type TypeGraphWalkerOptions } from './TypeGraphWalker';

type Env = Record<string, string | undefined>;

/** Walker whose recursion depth comes from DISCOVERY_RECURSION_DEPTH. */
export function createTypeGraphWalkerFromEnv(
  document: InterfaceDocument,
  overrides: TypeGraphWalkerOptions = {},
  env: Env = process.env,
): TypeGraphWalker {
  return new TypeGraphWalker(document, { maxDepth: readEngineConfig(env).recursionDepth, ...overrides });
}

/** Loads (or reuses) the document through the call builder's cache and wraps it. */
export async function loadTypeGraphWalker(
  calls: CallBuilder,
  source: DocumentSource,
  options: TypeGraphWalkerOptions = {},
): Promise<TypeGraphWalker> {
  return new TypeGraphWalker(await calls.document(source), options);
}
