// Value object exports

export { ValueObject } from './value-object.js';
export { ValueEquality } from './value-equality.js';
export { VALUE_OBJECT, isValueObject } from './brand.js';

// Accessor compilation
export {
  AccessorCompiler,
  compileExtractor,
  extractByReflection,
  flattenComponents,
  flattenStructured,
  isStructuredValue,
  LIST_START,
  LIST_END,
  RECORD_START,
  RECORD_END,
  TRUNCATED,
} from './accessor-compiler.js';
export type { AccessorCompilerOptions, ComponentExtractor } from './accessor-compiler.js';
