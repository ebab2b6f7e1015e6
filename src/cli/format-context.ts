/**
 * CLI output format resolution context.
 *
 * Singleton that holds the resolved output format for the current CLI invocation.
 * Set once in the Commander.js preAction hook; read by cliOutput() and renderers.
 */

export type OutputFormat = 'json' | 'human';

export interface FormatResolution {
  format: OutputFormat;
  source: 'flag' | 'default';
  quiet: boolean;
}

const DEFAULT_RESOLUTION: FormatResolution = {
  format: 'json',
  source: 'default',
  quiet: false,
};

/**
 * Current resolved format for this CLI invocation.
 * Defaults to JSON until resolved by the preAction hook.
 */
let currentResolution: FormatResolution = { ...DEFAULT_RESOLUTION };

/**
 * Resolve the format from the global flags. --human wins over --json.
 */
export function resolveFormat(flags: { json?: boolean; human?: boolean; quiet?: boolean }): FormatResolution {
  const quiet = flags.quiet === true;
  if (flags.human) return { format: 'human', source: 'flag', quiet };
  if (flags.json) return { format: 'json', source: 'flag', quiet };
  return { ...DEFAULT_RESOLUTION, quiet };
}

export function setFormatContext(resolution: FormatResolution): void {
  currentResolution = resolution;
}

export function getFormatContext(): FormatResolution {
  return currentResolution;
}

/** Back to the JSON default. Used between programmatic runs. */
export function resetFormatContext(): void {
  currentResolution = { ...DEFAULT_RESOLUTION };
}
