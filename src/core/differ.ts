/**
 * Schema Diff Engine
 *
 * Compares two SchemaModels and produces an ordered list of SchemaChange
 * items describing every structural difference between them.
 */

import {
  ChangeKind,
  ChangeSeverity,
  DiffOptions,
  EnumValueDefinition,
  SchemaChange,
  SchemaModel,
  TypeChangePolicy,
  TypeDefinition,
  TypeRef,
} from './types';
import { baseName, renderTypeRef } from './type-ref';

// ─── Classification Tables ──────────────────────────────────────────────────

const BREAKING_SEVERITY: ChangeSeverity = 'critical';

const SEVERITY_MAP: Record<Exclude<ChangeKind, 'field_type_changed'>, ChangeSeverity> = {
  type_added: 'minor',
  type_removed: 'critical',
  field_added: 'minor',
  field_removed: 'critical',
  enum_value_added: 'minor',
  enum_value_removed: 'critical',
};

/**
 * Scalars that may replace one another without breaking clients. Each
 * built-in scalar is only compatible with itself.
 */
const COMPATIBILITY_CLASSES: ReadonlyMap<string, string> = new Map([
  ['String', 'string'],
  ['Int', 'int'],
  ['Float', 'float'],
  ['Boolean', 'boolean'],
  ['ID', 'id'],
]);

const SEVERITY_ORDER: Record<ChangeSeverity, number> = {
  minor: 0,
  major: 1,
  critical: 2,
};

// ─── Helpers ────────────────────────────────────────────────────────────────

type MemberPosition = 'output' | 'input';

interface TypedMember {
  name: string;
  type: TypeRef;
}

function change(
  kind: Exclude<ChangeKind, 'field_type_changed'>,
  typeName: string,
  description: string,
  extra: Pick<SchemaChange, 'memberName' | 'impact' | 'recommendation'> = {}
): SchemaChange {
  const severity = SEVERITY_MAP[kind];
  return {
    kind,
    severity,
    isBreaking: severity === BREAKING_SEVERITY,
    typeName,
    description,
    ...extra,
  };
}

function sameCompatibilityClass(before: string, after: string): boolean {
  const cls = COMPATIBILITY_CLASSES.get(before);
  return cls !== undefined && cls === COMPATIBILITY_CLASSES.get(after);
}

/**
 * Walks both wrapper chains in step. In output position a value may become
 * stricter (nullable → non-null) but not looser; input position is the
 * reverse. Any difference in list nesting is unsafe.
 */
function isWrapperChangeSafe(before: TypeRef, after: TypeRef, position: MemberPosition): boolean {
  let a: TypeRef = before;
  let b: TypeRef = after;

  for (;;) {
    if (a.kind === 'NonNull' && b.kind === 'NonNull') {
      a = a.ofType;
      b = b.ofType;
    } else if (a.kind === 'NonNull') {
      if (position === 'output') return false;
      a = a.ofType;
    } else if (b.kind === 'NonNull') {
      if (position === 'input') return false;
      b = b.ofType;
    } else if (a.kind === 'List' && b.kind === 'List') {
      a = a.ofType;
      b = b.ofType;
    } else if (a.kind === 'Named' && b.kind === 'Named') {
      return a.name === b.name;
    } else {
      return false;
    }
  }
}

/**
 * Whether replacing a member's type breaks existing clients.
 */
export function isTypeChangeBreaking(
  before: TypeRef,
  after: TypeRef,
  policy: TypeChangePolicy = 'base-name',
  position: MemberPosition = 'output'
): boolean {
  switch (policy) {
    case 'base-name':
      return !sameCompatibilityClass(baseName(before), baseName(after));
    case 'structural':
      return !isWrapperChangeSafe(before, after, position);
  }
}

// ─── Member Diffs ───────────────────────────────────────────────────────────

function diffTypedMembers(
  typeName: string,
  before: readonly TypedMember[],
  after: readonly TypedMember[],
  position: MemberPosition,
  policy: TypeChangePolicy
): SchemaChange[] {
  const changes: SchemaChange[] = [];
  const afterByName = new Map(after.map((m) => [m.name, m]));
  const beforeNames = new Set(before.map((m) => m.name));

  for (const member of before) {
    const next = afterByName.get(member.name);

    if (!next) {
      changes.push(
        change('field_removed', typeName, `Field '${member.name}' was removed from type '${typeName}'`, {
          memberName: member.name,
          impact:
            position === 'output'
              ? 'Queries selecting this field will fail'
              : 'Inputs providing this field will fail',
          recommendation: 'Use deprecation before removal',
        })
      );
      continue;
    }

    const oldType = renderTypeRef(member.type);
    const newType = renderTypeRef(next.type);
    if (oldType === newType) continue;

    const isBreaking = isTypeChangeBreaking(member.type, next.type, policy, position);
    changes.push({
      kind: 'field_type_changed',
      severity: isBreaking ? BREAKING_SEVERITY : 'major',
      isBreaking,
      typeName,
      memberName: member.name,
      description: `Field '${member.name}' type changed from '${oldType}' to '${newType}' in type '${typeName}'`,
      impact: isBreaking ? 'May cause client parsing errors' : 'Client adaptation may be needed',
      recommendation: isBreaking
        ? 'Add a new field with the new type alongside the old one and deprecate the old field'
        : undefined,
      before: oldType,
      after: newType,
    });
  }

  for (const member of after) {
    if (beforeNames.has(member.name)) continue;
    changes.push(
      change('field_added', typeName, `Field '${member.name}' was added to type '${typeName}'`, {
        memberName: member.name,
        impact: 'New data available to clients',
      })
    );
  }

  return changes;
}

function diffEnumValues(
  typeName: string,
  before: readonly EnumValueDefinition[],
  after: readonly EnumValueDefinition[]
): SchemaChange[] {
  const changes: SchemaChange[] = [];
  const beforeNames = new Set(before.map((v) => v.name));
  const afterNames = new Set(after.map((v) => v.name));

  for (const value of before) {
    if (afterNames.has(value.name)) continue;
    changes.push(
      change(
        'enum_value_removed',
        typeName,
        `Enum value '${value.name}' was removed from enum '${typeName}'`,
        {
          memberName: value.name,
          impact: 'Queries and variables using this value will fail',
          recommendation: 'Deprecate the value before removal',
        }
      )
    );
  }

  for (const value of after) {
    if (beforeNames.has(value.name)) continue;
    changes.push(
      change('enum_value_added', typeName, `Enum value '${value.name}' was added to enum '${typeName}'`, {
        memberName: value.name,
        impact: 'Clients handling every value of this enum may need an update',
      })
    );
  }

  return changes;
}

function typeRemoved(name: string): SchemaChange {
  return change('type_removed', name, `Type '${name}' was removed`, {
    impact: 'All queries using this type will fail',
    recommendation: 'Ensure no clients are using this type before removal',
  });
}

function typeAdded(name: string): SchemaChange {
  return change('type_added', name, `Type '${name}' was added`, {
    impact: 'New functionality available to clients',
  });
}

/**
 * Compare two definitions of the same name. A change of kind is reported as
 * the old type being removed and the new one added.
 */
function diffTypes(
  before: TypeDefinition,
  after: TypeDefinition,
  policy: TypeChangePolicy
): SchemaChange[] {
  if (before.kind === 'OBJECT' || before.kind === 'INTERFACE') {
    if ((after.kind === 'OBJECT' || after.kind === 'INTERFACE') && after.kind === before.kind) {
      return diffTypedMembers(before.name, before.fields, after.fields, 'output', policy);
    }
  } else if (before.kind === 'INPUT_OBJECT') {
    if (after.kind === 'INPUT_OBJECT') {
      return diffTypedMembers(before.name, before.inputFields, after.inputFields, 'input', policy);
    }
  } else if (before.kind === 'ENUM') {
    if (after.kind === 'ENUM') {
      return diffEnumValues(before.name, before.enumValues, after.enumValues);
    }
  } else if (after.kind === before.kind) {
    // Unions and scalars carry no member-level changes
    return [];
  }

  return [typeRemoved(before.name), typeAdded(after.name)];
}

// ─── Main Diff ──────────────────────────────────────────────────────────────

/**
 * Compare two schema models and return all detected changes.
 *
 * Order: removed types, then member changes of shared types (in the old
 * model's order), then added types (in the new model's order).
 *
 * @param before - The previous/baseline model
 * @param after  - The current/new model
 */
export function diffSchemaModels(
  before: SchemaModel,
  after: SchemaModel,
  options: DiffOptions = {}
): SchemaChange[] {
  const policy = options.typeChangePolicy ?? 'base-name';
  const changes: SchemaChange[] = [];

  for (const name of before.types.keys()) {
    if (!after.types.has(name)) {
      changes.push(typeRemoved(name));
    }
  }

  for (const [name, oldDef] of before.types) {
    const newDef = after.types.get(name);
    if (newDef) {
      changes.push(...diffTypes(oldDef, newDef, policy));
    }
  }

  for (const name of after.types.keys()) {
    if (!before.types.has(name)) {
      changes.push(typeAdded(name));
    }
  }

  return changes;
}

/**
 * Keep changes at or above a minimum severity. Classification is unchanged.
 */
export function filterBySeverity(
  changes: readonly SchemaChange[],
  minSeverity: ChangeSeverity
): SchemaChange[] {
  const threshold = SEVERITY_ORDER[minSeverity];
  return changes.filter((c) => SEVERITY_ORDER[c.severity] >= threshold);
}

/**
 * Numeric rank of a severity (minor = 0, critical = 2).
 */
export function severityRank(severity: ChangeSeverity): number {
  return SEVERITY_ORDER[severity];
}
