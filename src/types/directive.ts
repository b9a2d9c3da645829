/**
 * Convert by calling a zero-argument instance method on the source value.
 */
export type PushDirective = {
  kind: 'push';
  /**
   * Instance method name, e.g. `__as_Foo_Bar`.
   */
  method: string;
};

/**
 * Convert by calling a one-argument static method on the target class,
 * passing the source value.
 */
export type PullDirective = {
  kind: 'pull';
  /**
   * Static method name, e.g. `__from_My_Thing`.
   */
  method: string;
};

/**
 * Convert through an external converter registered for the exact pair.
 */
export type BridgeDirective = {
  kind: 'bridge';
  /**
   * Display label of the converter (its function name unless given).
   */
  label: string;
};

/**
 * No conversion is known for the pair.
 */
export type NoDirective = {
  kind: 'none';
};

/**
 * Resolved description of how to convert one source type into one target
 * type.
 */
export type Directive =
  | PushDirective
  | PullDirective
  | BridgeDirective
  | NoDirective;

export type DirectiveKind = Directive['kind'];

/**
 * Shared `none` directive.
 *
 * Failed resolutions are cached too; sharing the sentinel avoids one
 * allocation per failed pair.
 */
export const NO_CONVERSION: NoDirective = Object.freeze({ kind: 'none' });

export function push(method: string): PushDirective {
  return { kind: 'push', method };
}

export function pull(method: string): PullDirective {
  return { kind: 'pull', method };
}

export function bridged(label: string): BridgeDirective {
  return { kind: 'bridge', label };
}

/**
 * Structural equality of two directives.
 */
export function isSameDirective(a: Directive, b: Directive): boolean {
  switch (a.kind) {
    case 'push':
    case 'pull':
      return b.kind === a.kind && b.method === a.method;
    case 'bridge':
      return b.kind === 'bridge' && b.label === a.label;
    case 'none':
      return b.kind === 'none';
  }
}

/**
 * Renders a directive for messages and debug output,
 * e.g. `push(__as_Bar)`.
 */
export function describeDirective(directive: Directive): string {
  switch (directive.kind) {
    case 'push':
    case 'pull':
      return `${directive.kind}(${directive.method})`;
    case 'bridge':
      return `bridge(${directive.label})`;
    case 'none':
      return 'none';
  }
}
