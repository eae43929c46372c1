import {optional, withDefault} from '@optique/core/modifiers';
import {option} from '@optique/core/primitives';
import {choice, integer} from '@optique/core/valueparser';
import {message, type Message} from '@optique/core/message';
import {LOG_LEVELS, RESOLVER_KINDS} from '@typebus/core';

// Resolver strategy, or every one of them in turn
export const resolverChoice = choice([...RESOLVER_KINDS, 'all'] as const);

// Output format choices
export const outputFormat = choice(['text', 'json'] as const);

// Common output option
export const outputOption = withDefault(
  option('-o', '--output', outputFormat, { description: message`Output format (text, json)` }),
  'text' as const,
);

// Overrides TYPEBUS_LOG_LEVEL for the run
export const logLevelOption = optional(
  option('--log-level', choice(LOG_LEVELS), { description: message`Log level (default from TYPEBUS_LOG_LEVEL)` }),
);

/** A positive count option with a default. */
export function countOption(name: `--${string}`, fallback: number, description: Message) {
  return withDefault(option(name, integer({ min: 1 }), { description }), fallback);
}
