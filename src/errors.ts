/**
 * Discriminant for every fatal condition raised by the library.
 *
 * "No conversion available" is deliberately absent: it is a normal outcome
 * (`undefined`), not an error.
 */
export type CoercionErrorCode =
  | 'InvalidTypeName'
  | 'InvalidMethodName'
  | 'TargetNotLoaded'
  | 'MethodCollision'
  | 'UnsupportedImport'
  | 'DuplicateType';

const PREFIX = '[coercible]';

/**
 * Base class of all configuration and validation failures.
 *
 * Consumers can branch on `code` instead of `instanceof` checks when the error
 * crosses a module-instance boundary.
 */
export class CoercionError extends Error {
  readonly code: CoercionErrorCode;

  constructor(code: CoercionErrorCode, message: string, options?: ErrorOptions) {
    super(`${PREFIX} ${message}`, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * A type name failed validation (see `validateTypeName`).
 */
export class InvalidTypeNameError extends CoercionError {
  readonly input: unknown;

  constructor(input: unknown) {
    super('InvalidTypeName', `Illegal type name ${describeInput(input)}.`);
    this.input = input;
  }
}

/**
 * A method name failed validation (see `validateMethodName`).
 */
export class InvalidMethodNameError extends CoercionError {
  readonly input: unknown;

  constructor(input: unknown) {
    super('InvalidMethodName', `Illegal method name ${describeInput(input)}.`);
    this.input = input;
  }
}

/**
 * The requested target type is not defined in the registry.
 *
 * When raised while installing a bound helper, `cause` carries the error the
 * type's loader threw, if any.
 */
export class TargetNotLoadedError extends CoercionError {
  readonly typeName: string;

  constructor(typeName: string, message: string, options?: ErrorOptions) {
    super('TargetNotLoaded', message, options);
    this.typeName = typeName;
  }
}

/**
 * A bound helper would replace an existing member of the consumer.
 */
export class MethodCollisionError extends CoercionError {
  readonly method: string;

  constructor(consumer: string, method: string) {
    super(
      'MethodCollision',
      `Cannot create "${consumer}.${method}": it already exists.`
    );
    this.method = method;
  }
}

/**
 * `install` was called with an argument shape it does not recognise.
 */
export class UnsupportedImportError extends CoercionError {
  constructor(message: string) {
    super('UnsupportedImport', message);
  }
}

/**
 * A type name or class was registered twice.
 */
export class DuplicateTypeError extends CoercionError {
  readonly typeName: string;

  constructor(typeName: string, message: string) {
    super('DuplicateType', message);
    this.typeName = typeName;
  }
}

function describeInput(input: unknown): string {
  return typeof input === 'string' ? `"${input}"` : `(${typeof input})`;
}
