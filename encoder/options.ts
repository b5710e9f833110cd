import { z } from 'zod';

import { MarkupEncoderError, MarkupErrorCode } from './errors.js';
import type { Logger } from './logger.js';
import type { MethodSemantics } from './semantics.js';
import type { SymbolClassifier } from './variable-kind.js';

const semanticsShape = z.object({
  getTypeName: z.function(),
  getAssemblyName: z.function(),
  getLineNumber: z.function(),
  getSpecialType: z.function(),
});

function isLogger(value: unknown): value is Logger {
  return typeof value === 'object' && value !== null &&
    'child' in value && typeof value.child === 'function' &&
    'isLevelEnabled' in value && typeof value.isLevelEnabled === 'function';
}

export const methodMarkupOptionsSchema = z.object({
  semantics: z.custom<MethodSemantics>((value) => semanticsShape.safeParse(value).success, {
    message: 'expected getTypeName, getAssemblyName, getLineNumber and getSpecialType functions',
  }),
  newLine: z.enum(['\n', '\r\n']).default('\n'),
  logger: z.custom<Logger>(isLogger, { message: 'expected a pino logger' }).optional(),
  classifySymbol: z.custom<SymbolClassifier>((value) => typeof value === 'function', {
    message: 'expected a function',
  }).optional(),
});

export type MethodMarkupBuilderOptions = z.input<typeof methodMarkupOptionsSchema>;
export type ResolvedMethodMarkupOptions = z.output<typeof methodMarkupOptionsSchema>;

export function resolveMethodMarkupOptions(options: MethodMarkupBuilderOptions): ResolvedMethodMarkupOptions {
  const parsed = methodMarkupOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new MarkupEncoderError(MarkupErrorCode.InvalidOptions, `Invalid method markup options: ${issues}`);
  }
  return parsed.data;
}
