import prompts from 'prompts';

import { logger, LogLevel, setLevel } from '../logger';

const FALSY_ENV_VALUES = new Set(['', 'undefined', 'null', '0', 'false', 'no']);
export function envToBool(envVar: unknown): boolean {
  const normalized = String(envVar).toLowerCase();
  return !FALSY_ENV_VALUES.has(normalized);
}

export type LogLevelName = keyof typeof LogLevel;

export interface GlobalFlags {
  'dry-run': boolean;
  'no-input': boolean;
  'log-level': LogLevelName;
}

const GLOBAL_FLAGS: GlobalFlags = {
  'dry-run': false,
  'no-input': false,
  'log-level': 'Info',
};

function isLogLevelName(value: string): value is LogLevelName {
  return value in LogLevel && isNaN(Number(value));
}

export function setGlobals(
  argv: Partial<Record<keyof GlobalFlags, unknown>>
): void {
  const level = String(argv['log-level'] ?? 'Info');
  GLOBAL_FLAGS['dry-run'] = argv['dry-run'] === true;
  GLOBAL_FLAGS['no-input'] = argv['no-input'] === true;
  GLOBAL_FLAGS['log-level'] = isLogLevelName(level) ? level : 'Info';
  logger.trace('Global flags:', GLOBAL_FLAGS);
  setLevel(LogLevel[GLOBAL_FLAGS['log-level']]);
}

export function isDryRun(): boolean {
  return GLOBAL_FLAGS['dry-run'];
}

export function hasInput(): boolean {
  return !GLOBAL_FLAGS['no-input'];
}

/**
 * Prompt the user that everything is OK and we should proceed
 *
 * @returns false when the user declined
 */
export async function promptConfirmation(message: string): Promise<boolean> {
  if (!hasInput()) {
    logger.debug('Skipping the confirmation prompt.');
    return true;
  }
  const { isReady } = await prompts({
    message: `${message} Type "yes" to proceed:`,
    name: 'isReady',
    type: 'text',
    // Force the user to type something longer than y/n
    validate: (input: string) =>
      input.length >= 2 || 'Please type "yes" to proceed',
  });
  return typeof isReady === 'string' && isReady.toLowerCase() === 'yes';
}
