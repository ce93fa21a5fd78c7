export {
  InvalidEnumValueError,
  enumExtend,
  type EnumExtendOptions,
  type EnumHelpers,
  type ExtendedEnum,
} from './enum-extend.js';

export {
  asyncWithContext,
  withContext,
  type AsyncContextManager,
  type ContextManager,
} from './with.js';
