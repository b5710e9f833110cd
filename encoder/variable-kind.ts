import { MarkupEncoderError, MarkupErrorCode, unmappedVariant } from './errors.js';
import { SymbolKind, VariableKind } from './kinds.js';
import type { SymbolInfo } from './semantics.js';

export type SymbolClassifier = (symbol: SymbolInfo | undefined) => VariableKind;

/**
 * Default symbol classification for `variablekind` attributes.
 * An unresolved symbol is Unknown; events count as fields and parameters as
 * locals. Types, namespaces and the like never name a variable and fail.
 */
export function getVariableKind(symbol: SymbolInfo | undefined): VariableKind {
  if (!symbol) return VariableKind.Unknown;

  switch (symbol.kind) {
    case SymbolKind.Event:
    case SymbolKind.Field:
      return VariableKind.Field;
    case SymbolKind.Local:
    case SymbolKind.Parameter:
      return VariableKind.Local;
    case SymbolKind.Method:
      return VariableKind.Method;
    case SymbolKind.Property:
      return VariableKind.Property;
    case SymbolKind.Label:
    case SymbolKind.NamedType:
    case SymbolKind.Namespace:
    case SymbolKind.TypeParameter:
      return unsupportedSymbol(symbol);
    default:
      return unmappedVariant('SymbolKind', symbol.kind, SymbolKind);
  }
}

function unsupportedSymbol(symbol: SymbolInfo): never {
  throw new MarkupEncoderError(MarkupErrorCode.UnmappedVariant,
    `Invalid symbol kind: ${SymbolKind[symbol.kind]} (${symbol.name})`);
}
