import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';

import { PatternError, type Logger } from '../errors.js';
import { formatPatternList, parsePatternName } from '../patterns/registry.js';
import { PATTERN_NAMES, type PatternName } from '../patterns/types.js';
import type { PatternController } from './types.js';

export type ControlCommand =
  | { kind: 'switch'; pattern: PatternName }
  | { kind: 'next' }
  | { kind: 'prev' }
  | { kind: 'list' }
  | { kind: 'status' }
  | { kind: 'help' }
  | { kind: 'quit' }
  | { kind: 'empty' }
  | { kind: 'invalid'; input: string; message: string };

export const CONTROL_HELP = `Commands: <number> | <pattern name> | next | prev | list | status | quit`;

export const parseControlLine = (line: string): ControlCommand => {
  const input = line.trim();
  if (input === '') return { kind: 'empty' };
  switch (input.toLowerCase()) {
    case 'n':
    case 'next':
      return { kind: 'next' };
    case 'p':
    case 'prev':
      return { kind: 'prev' };
    case 'l':
    case 'list':
      return { kind: 'list' };
    case 's':
    case 'status':
      return { kind: 'status' };
    case 'h':
    case '?':
    case 'help':
      return { kind: 'help' };
    case 'q':
    case 'quit':
    case 'exit':
      return { kind: 'quit' };
  }
  try {
    return { kind: 'switch', pattern: parsePatternName(input) };
  } catch (error) {
    if (error instanceof PatternError) {
      return { kind: 'invalid', input, message: error.message };
    }
    throw error;
  }
};

export const stepPattern = (current: PatternName, offset: number): PatternName => {
  const index = PATTERN_NAMES.indexOf(current);
  const count = PATTERN_NAMES.length;
  return PATTERN_NAMES[(((index + offset) % count) + count) % count];
};

/** Applies one command; returns the line to print, if any. */
export const applyControlCommand = (
  command: ControlCommand,
  controller: PatternController,
): string | null => {
  switch (command.kind) {
    case 'empty':
      return null;
    case 'switch':
    case 'next':
    case 'prev': {
      const target =
        command.kind === 'switch'
          ? command.pattern
          : stepPattern(controller.currentPattern(), command.kind === 'next' ? 1 : -1);
      return controller.requestPattern(target)
        ? `[control] switching to ${target}`
        : '[control] session is stopping; pattern unchanged';
    }
    case 'list':
      return formatPatternList(controller.currentPattern());
    case 'status': {
      const status = controller.status();
      const pending = status.pendingPattern ? ` (-> ${status.pendingPattern})` : '';
      return `[control] ${status.state}: ${status.pattern}${pending}, ${status.lights} lights, ${status.ticks} ticks, audio ${status.audio.source}`;
    }
    case 'help':
      return CONTROL_HELP;
    case 'quit':
      controller.requestStop();
      return '[control] stopping';
    case 'invalid':
      return `[control] ${command.message}; pattern unchanged. ${CONTROL_HELP}`;
  }
};

/** Reads commands line by line until the stream ends; returns a detach function. */
export const attachControlInput = (
  input: Readable,
  controller: PatternController,
  logger: Logger = console,
): (() => void) => {
  const lines = createInterface({ input, terminal: false });
  lines.on('line', (line) => {
    const command = parseControlLine(line);
    const message = applyControlCommand(command, controller);
    if (message === null) return;
    if (command.kind === 'invalid') {
      logger.warn(message);
    } else {
      logger.log(message);
    }
  });
  return () => lines.close();
};
