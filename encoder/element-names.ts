/**
 * Element and attribute names understood by downstream consumers.
 * These strings are a wire contract; do not rename.
 */

export const ElementName = {
  Argument: 'Argument',
  Array: 'Array',
  ArrayElementAccess: 'ArrayElementAccess',
  ArrayType: 'ArrayType',
  Assignment: 'Assignment',
  BaseReference: 'BaseReference',
  BinaryOperation: 'BinaryOperation',
  Block: 'Block',
  Boolean: 'Boolean',
  Bound: 'Bound',
  Cast: 'Cast',
  Char: 'Char',
  Comment: 'Comment',
  Expression: 'Expression',
  ExpressionStatement: 'ExpressionStatement',
  Literal: 'Literal',
  Local: 'Local',
  MethodCall: 'MethodCall',
  Name: 'Name',
  NameRef: 'NameRef',
  NewArray: 'NewArray',
  NewClass: 'NewClass',
  NewDelegate: 'NewDelegate',
  Null: 'Null',
  Number: 'Number',
  Parentheses: 'Parentheses',
  Quote: 'Quote',
  String: 'String',
  ThisReference: 'ThisReference',
  Type: 'Type',
} as const;

export type ElementName = typeof ElementName[keyof typeof ElementName];

export const AttributeName = {
  BinaryOperator: 'binaryoperator',
  DirectCast: 'directcast',
  FullName: 'fullname',
  Implicit: 'implicit',
  Line: 'line',
  Name: 'name',
  Rank: 'rank',
  TryCast: 'trycast',
  Type: 'type',
  VariableKind: 'variablekind',
} as const;

export type AttributeName = typeof AttributeName[keyof typeof AttributeName];
