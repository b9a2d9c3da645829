export type { TypeRegistry } from './type-registry';
export { createTypeRegistry } from './type-registry';
export {
  ancestorPrototypes,
  collectInstanceMembers,
  collectStaticMembers
} from './members';
