export type { CoercionSchemaOptions } from './coercion-schema';
export { createCoercionSchema } from './coercion-schema';
export { validateWithSchema } from './validator';
