/**
 * Analysis-layer interface consumed by the method markup builder.
 * The builder never inspects source code itself; everything it needs about
 * types, positions and symbols comes through MethodSemantics.
 */

import type { SymbolKind } from './kinds.js';

export enum TypeKind {
  Named,
  Array,
}

export interface NamedTypeSymbol {
  readonly typeKind: TypeKind.Named;
  readonly name: string;
}

export interface ArrayTypeSymbol {
  readonly typeKind: TypeKind.Array;
  /** Dimensions of this array type alone; `T[][]` is rank 1 around rank 1. */
  readonly rank: number;
  readonly elementType: TypeSymbol;
}

export type TypeSymbol = NamedTypeSymbol | ArrayTypeSymbol;

/** Well-known types the builder can ask for by identity. */
export enum SpecialType {
  Object,
  Void,
  Boolean,
  Char,
  SByte,
  Byte,
  Int16,
  UInt16,
  Int32,
  UInt32,
  Int64,
  UInt64,
  Decimal,
  Single,
  Double,
  String,
}

/** A syntax node as far as the builder cares: where it starts and its source text. */
export interface SourceNode {
  readonly spanStart: number;
  readonly text: string;
}

export interface SymbolInfo {
  readonly kind: SymbolKind;
  readonly name: string;
}

export interface MethodSemantics {
  /** Metadata name, e.g. `System.Int32` or `Outer+Nested`. */
  getTypeName(type: TypeSymbol): string;
  /** Display name of the assembly that defines the type. */
  getAssemblyName(type: TypeSymbol): string;
  /** Zero-based line containing a source position. */
  getLineNumber(position: number): number;
  getSpecialType(special: SpecialType): NamedTypeSymbol;
}
