/**
 * Closed classifications supplied by the analysis layer.
 * `None` members mean "no information" and map to an omitted attribute.
 */

export enum BinaryOperatorKind {
  None,
  Plus,
  BitwiseOr,
  BitwiseAnd,
  Concatenate,
  AddDelegate,
}

export enum VariableKind {
  None,
  Property,
  Method,
  Field,
  Local,
  Unknown,
}

export enum SpecialCastKind {
  DirectCast,
  TryCast,
}

/**
 * Kind of a resolved symbol, as reported by the analysis layer.
 * Only a subset classifies into a VariableKind (see getVariableKind).
 */
export enum SymbolKind {
  Event,
  Field,
  Label,
  Local,
  Method,
  NamedType,
  Namespace,
  Parameter,
  Property,
  TypeParameter,
}
