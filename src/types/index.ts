export type {
  BridgeConverter,
  Coerced,
  CoerceFunction,
  BoundCoercion,
  Constructor
} from './primitives';
export type {
  BridgeDirective,
  Directive,
  DirectiveKind,
  NoDirective,
  PullDirective,
  PushDirective
} from './directive';
export {
  NO_CONVERSION,
  bridged,
  describeDirective,
  isSameDirective,
  pull,
  push
} from './directive';
export type {
  DefineTypeOptions,
  MemberKind,
  TypeDefinition,
  TypeLoader
} from './registry';
