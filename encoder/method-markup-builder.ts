/**
 * Method Markup Builder
 *
 * Emission substrate for serializing a method body as nested markup. A visitor
 * walks the syntax tree and calls the tag helpers and generators below; the
 * builder owns the output, keeps elements properly nested and escapes all
 * text. One builder serves one method body.
 *
 * ```ts
 * const builder = createMethodMarkupBuilder({ semantics });
 * builder.within(builder.expressionStatementTag(3), () => {
 *   builder.within(builder.assignmentTag(), () => {
 *     builder.within(builder.expressionTag(), () => builder.generateNameRef(VariableKind.Local, 'x'));
 *     builder.within(builder.expressionTag(), () => builder.generateNullLiteral());
 *   });
 * });
 * builder.finish();
 * ```
 */

import {
  binaryOperatorAttribute,
  fullNameAttribute,
  implicitAttribute,
  lineNumberAttribute,
  nameAttribute,
  rankAttribute,
  specialCastKindAttribute,
  typeAttribute,
  variableKindAttribute,
} from './attributes.js';
import { ElementName } from './element-names.js';
import { BinaryOperatorKind, type SpecialCastKind, type VariableKind } from './kinds.js';
import { createTagWriter, type TagScope, type TagWriter, type TagWriterDebugState } from './markup/tag-writer.js';
import { formatNumericValue, type NumericValue } from './number-format.js';
import { resolveMethodMarkupOptions, type MethodMarkupBuilderOptions } from './options.js';
import {
  TypeKind,
  type MethodSemantics,
  type SourceNode,
  type SpecialType,
  type SymbolInfo,
  type TypeSymbol,
} from './semantics.js';
import { getVariableKind } from './variable-kind.js';

export interface MethodMarkupBuilder extends Pick<TagWriter,
  'within' | 'mark' | 'release' | 'rewind' | 'tryEmit' | 'lookAhead' | 'finish' | 'toString'> {

  readonly semantics: MethodSemantics;
  readonly depth: number;

  // Element scopes
  argumentTag(): TagScope;
  arrayElementAccessTag(): TagScope;
  arrayTag(): TagScope;
  arrayTypeTag(rank: number): TagScope;
  assignmentTag(kind?: BinaryOperatorKind): TagScope;
  binaryOperationTag(kind: BinaryOperatorKind): TagScope;
  blockTag(): TagScope;
  booleanTag(): TagScope;
  boundTag(): TagScope;
  castTag(specialCastKind?: SpecialCastKind): TagScope;
  charTag(): TagScope;
  commentTag(): TagScope;
  expressionTag(): TagScope;
  expressionStatementTag(lineNumber: number): TagScope;
  literalTag(): TagScope;
  localTag(lineNumber: number): TagScope;
  methodCallTag(): TagScope;
  nameTag(): TagScope;
  nameRefTag(kind: VariableKind, name?: string | null, fullName?: string | null): TagScope;
  newArrayTag(): TagScope;
  newClassTag(): TagScope;
  newDelegateTag(name: string): TagScope;
  numberTag(typeName?: string | null): TagScope;
  parenthesesTag(): TagScope;
  quoteTag(lineNumber: number): TagScope;
  stringTag(): TagScope;
  typeTag(isImplicit?: boolean | null): TagScope;

  // Leaves
  baseReferenceTag(): void;
  nullTag(): void;
  thisReferenceTag(): void;

  lineBreak(): void;
  encodedText(text: string): void;

  // Analysis-layer helpers
  getVariableKind(symbol: SymbolInfo | undefined): VariableKind;
  getTypeName(type: TypeSymbol): string;
  getLineNumber(node: SourceNode): number;

  // Generators
  generateUnknown(node: SourceNode): void;
  generateName(name: string): void;
  generateNameRef(kind: VariableKind, name?: string | null, fullName?: string | null): void;
  generateType(type: TypeSymbol, isImplicit?: boolean | null, assemblyQualify?: boolean): void;
  generateSpecialType(specialType: SpecialType): void;
  generateNullLiteral(): void;
  generateNumber(value: NumericValue, type: TypeSymbol): void;
  generateSpecialNumber(value: NumericValue, specialType: SpecialType): void;
  generateChar(value: string): void;
  generateString(value: string): void;
  generateBoolean(value: boolean): void;
  generateThisReference(): void;
  generateBaseReference(): void;

  fillDebugState(state: Partial<TagWriterDebugState>): void;
}

export function createMethodMarkupBuilder(options: MethodMarkupBuilderOptions): MethodMarkupBuilder {
  const { semantics, newLine, logger, classifySymbol } = resolveMethodMarkupOptions(options);
  const writer = createTagWriter({ newLine, logger });

  function within<T>(scope: TagScope, body: () => T): T {
    return writer.within(scope, body);
  }

  function getTypeName(type: TypeSymbol): string {
    return semantics.getTypeName(type);
  }

  function getLineNumber(node: SourceNode): number {
    return semantics.getLineNumber(node.spanStart);
  }

  const argumentTag = () => writer.openTag(ElementName.Argument);
  const arrayElementAccessTag = () => writer.openTag(ElementName.ArrayElementAccess);
  const arrayTag = () => writer.openTag(ElementName.Array);
  const arrayTypeTag = (rank: number) => writer.openTag(ElementName.ArrayType, rankAttribute(rank));
  const assignmentTag = (kind: BinaryOperatorKind = BinaryOperatorKind.None) =>
    writer.openTag(ElementName.Assignment, binaryOperatorAttribute(kind));
  const binaryOperationTag = (kind: BinaryOperatorKind) =>
    writer.openTag(ElementName.BinaryOperation, binaryOperatorAttribute(kind));
  const blockTag = () => writer.openTag(ElementName.Block);
  const booleanTag = () => writer.openTag(ElementName.Boolean);
  const boundTag = () => writer.openTag(ElementName.Bound);
  const castTag = (specialCastKind?: SpecialCastKind) =>
    writer.openTag(ElementName.Cast, specialCastKindAttribute(specialCastKind));
  const charTag = () => writer.openTag(ElementName.Char);
  const commentTag = () => writer.openTag(ElementName.Comment);
  const expressionTag = () => writer.openTag(ElementName.Expression);
  const expressionStatementTag = (lineNumber: number) =>
    writer.openTag(ElementName.ExpressionStatement, lineNumberAttribute(lineNumber));
  const literalTag = () => writer.openTag(ElementName.Literal);
  const localTag = (lineNumber: number) => writer.openTag(ElementName.Local, lineNumberAttribute(lineNumber));
  const methodCallTag = () => writer.openTag(ElementName.MethodCall);
  const nameTag = () => writer.openTag(ElementName.Name);
  const nameRefTag = (kind: VariableKind, name?: string | null, fullName?: string | null) =>
    writer.openTag(ElementName.NameRef, variableKindAttribute(kind), nameAttribute(name), fullNameAttribute(fullName));
  const newArrayTag = () => writer.openTag(ElementName.NewArray);
  const newClassTag = () => writer.openTag(ElementName.NewClass);
  const newDelegateTag = (name: string) => writer.openTag(ElementName.NewDelegate, nameAttribute(name));
  const numberTag = (typeName?: string | null) => writer.openTag(ElementName.Number, typeAttribute(typeName));
  const parenthesesTag = () => writer.openTag(ElementName.Parentheses);
  const quoteTag = (lineNumber: number) => writer.openTag(ElementName.Quote, lineNumberAttribute(lineNumber));
  const stringTag = () => writer.openTag(ElementName.String);
  const typeTag = (isImplicit?: boolean | null) => writer.openTag(ElementName.Type, implicitAttribute(isImplicit));

  const baseReferenceTag = () => writer.appendLeafTag(ElementName.BaseReference);
  const nullTag = () => writer.appendLeafTag(ElementName.Null);
  const thisReferenceTag = () => writer.appendLeafTag(ElementName.ThisReference);

  function generateUnknown(node: SourceNode): void {
    within(quoteTag(getLineNumber(node)), () => writer.appendEncoded(node.text));
  }

  function generateName(name: string): void {
    within(nameTag(), () => writer.appendEncoded(name));
  }

  function generateNameRef(kind: VariableKind, name?: string | null, fullName?: string | null): void {
    writer.appendLeafTag(ElementName.NameRef,
      [variableKindAttribute(kind), nameAttribute(name), fullNameAttribute(fullName)]);
  }

  function generateType(type: TypeSymbol, isImplicit?: boolean | null, assemblyQualify = false): void {
    if (type.typeKind === TypeKind.Array) {
      within(arrayTypeTag(type.rank), () => generateType(type.elementType, isImplicit, assemblyQualify));
      return;
    }

    within(typeTag(isImplicit), () => {
      const typeName = assemblyQualify
        ? getTypeName(type) + ', ' + semantics.getAssemblyName(type)
        : getTypeName(type);
      writer.appendEncoded(typeName);
    });
  }

  function generateSpecialType(specialType: SpecialType): void {
    generateType(semantics.getSpecialType(specialType));
  }

  function generateNullLiteral(): void {
    within(literalTag(), nullTag);
  }

  function generateNumber(value: NumericValue, type: TypeSymbol): void {
    within(numberTag(getTypeName(type)), () => writer.appendEncoded(formatNumericValue(value)));
  }

  function generateSpecialNumber(value: NumericValue, specialType: SpecialType): void {
    generateNumber(value, semantics.getSpecialType(specialType));
  }

  function generateChar(value: string): void {
    within(charTag(), () => writer.appendEncoded(value));
  }

  function generateString(value: string): void {
    within(stringTag(), () => writer.appendEncoded(value));
  }

  function generateBoolean(value: boolean): void {
    within(booleanTag(), () => writer.appendEncoded(value ? 'true' : 'false'));
  }

  return {
    semantics,
    get depth() { return writer.depth; },

    within,
    mark: writer.mark,
    release: writer.release,
    rewind: writer.rewind,
    tryEmit: writer.tryEmit,
    lookAhead: writer.lookAhead,
    finish: writer.finish,
    toString: () => writer.toString(),
    fillDebugState: writer.fillDebugState,

    argumentTag,
    arrayElementAccessTag,
    arrayTag,
    arrayTypeTag,
    assignmentTag,
    binaryOperationTag,
    blockTag,
    booleanTag,
    boundTag,
    castTag,
    charTag,
    commentTag,
    expressionTag,
    expressionStatementTag,
    literalTag,
    localTag,
    methodCallTag,
    nameTag,
    nameRefTag,
    newArrayTag,
    newClassTag,
    newDelegateTag,
    numberTag,
    parenthesesTag,
    quoteTag,
    stringTag,
    typeTag,

    baseReferenceTag,
    nullTag,
    thisReferenceTag,

    lineBreak: writer.appendLineBreak,
    encodedText: writer.appendEncoded,

    getVariableKind: classifySymbol ?? getVariableKind,
    getTypeName,
    getLineNumber,

    generateUnknown,
    generateName,
    generateNameRef,
    generateType,
    generateSpecialType,
    generateNullLiteral,
    generateNumber,
    generateSpecialNumber,
    generateChar,
    generateString,
    generateBoolean,
    generateThisReference: thisReferenceTag,
    generateBaseReference: baseReferenceTag,
  };
}
