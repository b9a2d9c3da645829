import { DEBUG_ENV } from './constants';

/**
 * Debug Channels
 *
 * Targeted logging of registry changes, directive resolution and helper
 * installation. Channels are enabled through the environment:
 *
 * ```bash
 * COERCIBLE_DEBUG=resolve npm test          # resolution only
 * COERCIBLE_DEBUG=resolve,install npm test  # several channels
 * COERCIBLE_DEBUG=* npm test                # everything
 * ```
 *
 * Call sites stay in the code permanently; a disabled channel is a no-op
 * function resolved once, when the channel is created.
 */

/** Structured payload of a debug line. */
export type DebugData = Record<string, unknown>;

/** Logs when enabled, no-op when disabled. */
export type DebugChannel = (point: string, data?: DebugData) => void;

export type DebugConfig = {
  /**
   * `json` emits one JSON object per line; `pretty` emits
   * `[channel.point] { key=value, ... }`.
   *
   * @default 'pretty'
   */
  format: 'json' | 'pretty';

  /**
   * Prefix each line with an ISO timestamp.
   *
   * @default false
   */
  timestamps: boolean;

  /**
   * Sink for formatted lines.
   *
   * @default console.log
   */
  output: (message: string) => void;
};

const DEFAULT_CONFIG: DebugConfig = {
  format: 'pretty',
  timestamps: false,
  output: message => console.log(message)
};

let config: DebugConfig = { ...DEFAULT_CONFIG };

function parseDebugEnv(): Set<string> {
  const env = process.env[DEBUG_ENV] ?? '';
  if (!env || env === '0' || env === 'false') return new Set();
  if (env === '*' || env === '1' || env === 'true') return new Set(['*']);
  return new Set(env.split(',').map(s => s.trim().toLowerCase()));
}

let enabledChannels = parseDebugEnv();

function isEnabled(channel: string): boolean {
  return enabledChannels.has('*') || enabledChannels.has(channel);
}

function formatValue(value: unknown): string {
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';
  if (typeof value === 'string') return `"${value}"`;
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  if (typeof value === 'function') return `<${value.name || 'anonymous'}>`;
  if (Array.isArray(value)) return `[${value.map(formatValue).join(', ')}]`;
  if (typeof value === 'object') {
    if ('kind' in value && typeof value.kind === 'string') {
      return `<${value.kind}>`;
    }
    return '{...}';
  }
  return String(value);
}

/**
 * Formats a single debug line.
 *
 * Exported for tests; call sites use the channel functions.
 */
export function formatDebugMessage(
  channel: string,
  point: string,
  data: DebugData | undefined
): string {
  const prefix = config.timestamps ? `[${new Date().toISOString()}] ` : '';

  if (config.format === 'json') {
    return JSON.stringify({
      channel,
      point,
      ...(data && { data }),
      ...(config.timestamps && { timestamp: Date.now() })
    });
  }

  const label = `${prefix}[${channel}.${point}]`;
  if (!data || Object.keys(data).length === 0) return label;

  const parts = Object.entries(data).map(
    ([key, value]) => `${key}=${formatValue(value)}`
  );
  return `${label} { ${parts.join(', ')} }`;
}

function createChannel(name: string): DebugChannel {
  if (!isEnabled(name)) {
    return () => undefined;
  }
  return (point, data) => {
    config.output(formatDebugMessage(name, point, data));
  };
}

/**
 * Debug channels, one per subsystem.
 *
 * ```ts
 * debug.resolve('cache.miss', { source: 'Foo', target: 'Bar' });
 * ```
 */
export const debug = {
  /** Type definitions and loader runs. */
  registry: createChannel('registry'),

  /** Directive resolution and cache traffic. */
  resolve: createChannel('resolve'),

  /** Bound helper installation. */
  install: createChannel('install')
};

export type Debug = typeof debug;

/**
 * Re-reads `COERCIBLE_DEBUG` and recreates every channel.
 */
export function refreshDebugChannels(): void {
  enabledChannels = parseDebugEnv();
  debug.registry = createChannel('registry');
  debug.resolve = createChannel('resolve');
  debug.install = createChannel('install');
}

export function configureDebug(options: Partial<DebugConfig>): void {
  config = { ...config, ...options };
}

/**
 * Restores the default output configuration.
 */
export function resetDebugConfig(): void {
  config = { ...DEFAULT_CONFIG };
}

export function isDebugEnabled(channel?: string): boolean {
  if (channel) return isEnabled(channel.toLowerCase());
  return enabledChannels.size > 0;
}
