export { createMethodMarkupBuilder } from './method-markup-builder.js';
export type { MethodMarkupBuilder } from './method-markup-builder.js';

// Markup substrate
export * from './markup/attribute.js';
export * from './markup/escape.js';
export * from './markup/tag-writer.js';
export * from './markup/text-buffer.js';

export * from './attributes.js';
export * from './element-names.js';
export * from './errors.js';
export * from './kinds.js';
export * from './logger.js';
export * from './number-format.js';
export * from './options.js';
export * from './semantics.js';
export * from './variable-kind.js';

// Satellites
export * from './member-span-cache.js';
export * from './span-markers.js';
