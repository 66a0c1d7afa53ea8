/**
 * Type graph traversal over a SchemaModel.
 */

import { SchemaModel, TypeDefinition } from './types';
import { assertNever } from './errors';
import { baseName, DEFAULT_CUSTOM_SCALARS, isScalarLike } from './type-ref';

function referencedNames(def: TypeDefinition): string[] {
  switch (def.kind) {
    case 'OBJECT':
      return [
        ...def.interfaces,
        ...def.fields.flatMap((f) => [baseName(f.type), ...f.args.map((a) => baseName(a.type))]),
      ];
    case 'INTERFACE':
      return def.fields.flatMap((f) => [baseName(f.type), ...f.args.map((a) => baseName(a.type))]);
    case 'INPUT_OBJECT':
      return def.inputFields.map((f) => baseName(f.type));
    case 'UNION':
      return [...def.possibleTypes];
    case 'ENUM':
    case 'SCALAR':
      return [];
    default:
      return assertNever(def);
  }
}

/**
 * Names of every type reachable from `from`, breadth first, starting with
 * `from` itself. Scalar-like types are leaves and are left out; names that
 * the model does not define are skipped.
 */
export function reachableTypes(
  model: SchemaModel,
  from: string,
  customScalars: readonly string[] = DEFAULT_CUSTOM_SCALARS
): string[] {
  if (!model.types.has(from)) return [];

  const visited = new Set<string>([from]);
  const queue: string[] = [from];

  for (let i = 0; i < queue.length; i++) {
    const def = model.types.get(queue[i]);
    if (!def) continue;

    for (const name of referencedNames(def)) {
      if (visited.has(name) || isScalarLike(name, customScalars) || !model.types.has(name)) {
        continue;
      }
      visited.add(name);
      queue.push(name);
    }
  }

  return queue;
}
