/**
 * Attribute construction for method markup.
 * Every builder returns EmptyAttribute for "no information" input so the
 * attribute is left out of the open tag.
 */

import { AttributeName } from './element-names.js';
import { unmappedVariant } from './errors.js';
import { BinaryOperatorKind, SpecialCastKind, VariableKind } from './kinds.js';
import { createAttribute, EmptyAttribute, type AttributeInfo } from './markup/attribute.js';

export function getBinaryOperatorKindText(kind: Exclude<BinaryOperatorKind, BinaryOperatorKind.None>): string {
  switch (kind) {
    case BinaryOperatorKind.Plus: return 'plus';
    case BinaryOperatorKind.BitwiseOr: return 'bitor';
    case BinaryOperatorKind.BitwiseAnd: return 'bitand';
    case BinaryOperatorKind.Concatenate: return 'concatenate';
    case BinaryOperatorKind.AddDelegate: return 'adddelegate';
    default: return unmappedVariant('BinaryOperatorKind', kind, BinaryOperatorKind);
  }
}

export function getVariableKindText(kind: Exclude<VariableKind, VariableKind.None>): string {
  switch (kind) {
    case VariableKind.Property: return 'property';
    case VariableKind.Method: return 'method';
    case VariableKind.Field: return 'field';
    case VariableKind.Local: return 'local';
    case VariableKind.Unknown: return 'unknown';
    default: return unmappedVariant('VariableKind', kind, VariableKind);
  }
}

function isBlank(text: string): boolean {
  return text.trim().length === 0;
}

export function binaryOperatorAttribute(kind: BinaryOperatorKind): AttributeInfo {
  if (kind === BinaryOperatorKind.None) return EmptyAttribute;
  return createAttribute(AttributeName.BinaryOperator, getBinaryOperatorKindText(kind));
}

export function variableKindAttribute(kind: VariableKind): AttributeInfo {
  if (kind === VariableKind.None) return EmptyAttribute;
  return createAttribute(AttributeName.VariableKind, getVariableKindText(kind));
}

export function fullNameAttribute(name?: string | null): AttributeInfo {
  if (name == null || isBlank(name)) return EmptyAttribute;
  return createAttribute(AttributeName.FullName, name);
}

export function nameAttribute(name?: string | null): AttributeInfo {
  if (name == null || isBlank(name)) return EmptyAttribute;
  return createAttribute(AttributeName.Name, name);
}

export function typeAttribute(typeName?: string | null): AttributeInfo {
  if (typeName == null || isBlank(typeName)) return EmptyAttribute;
  return createAttribute(AttributeName.Type, typeName);
}

/** `implicit="yes"|"no"`, omitted when the flag is not known. */
export function implicitAttribute(isImplicit?: boolean | null): AttributeInfo {
  if (isImplicit === null || isImplicit === undefined) return EmptyAttribute;
  return createAttribute(AttributeName.Implicit, isImplicit ? 'yes' : 'no');
}

export function lineNumberAttribute(lineNumber: number): AttributeInfo {
  return createAttribute(AttributeName.Line, String(lineNumber));
}

export function rankAttribute(rank: number): AttributeInfo {
  return createAttribute(AttributeName.Rank, String(rank));
}

/** Direct and try casts get differently named flags; plain casts get none. */
export function specialCastKindAttribute(kind?: SpecialCastKind | null): AttributeInfo {
  switch (kind) {
    case SpecialCastKind.DirectCast: return createAttribute(AttributeName.DirectCast, 'yes');
    case SpecialCastKind.TryCast: return createAttribute(AttributeName.TryCast, 'yes');
    default: return EmptyAttribute;
  }
}
