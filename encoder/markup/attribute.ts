/**
 * Markup attribute values.
 * EmptyAttribute is the "omit me" marker; it is not the same as an attribute
 * whose value is the empty string, which is written as `name=""`.
 */

export interface Attribute {
  readonly name: string;
  readonly value: string;
}

export const EmptyAttribute: unique symbol = Symbol('EmptyAttribute');
export type EmptyAttribute = typeof EmptyAttribute;

export type AttributeInfo = Attribute | EmptyAttribute;

export function createAttribute(name: string, value: string): Attribute {
  return { name, value };
}

export function isEmptyAttribute(attribute: AttributeInfo): attribute is EmptyAttribute {
  return attribute === EmptyAttribute;
}
