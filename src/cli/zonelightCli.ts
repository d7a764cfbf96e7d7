#!/usr/bin/env node
import process from 'node:process';

import { probeFfmpeg } from '../audio/sources/ffmpegSource.js';
import { DEFAULT_CONFIG, type ZonelightConfig } from '../config/defaults.js';
import { loadConfig, type ConfigLoadResult, type ConfigOverrides } from '../config/loader.js';
import { formatIssue } from '../config/schema.js';
import { AudioSourceError, ConfigurationError, TransportError, describeError } from '../errors.js';
import { ZONES } from '../layout/zones.js';
import { formatPatternList, listPatterns } from '../patterns/registry.js';
import { LinkTransport } from '../transport/linkTransport.js';
import { LightSession, reportTeardown, stopOnSignals } from '../runtime/session.js';
import { formatSimulation, simulateSession, type SimulationSummary } from '../runtime/simulate.js';
import { promptZoneCounts } from './interactiveLayout.js';

const exitWithError = (message: string): never => {
  console.error(message);
  process.exit(1);
};

const printMainUsage = () => {
  console.log(`zonelight – audio-reactive zone lights for a remote 3D host

Commands:
  run [--config <file>] [--pattern <name|n>] [--audio <mode>] [--file <path>] [--url <ws-url>] [--interactive]
  simulate [--config <file>] [--pattern <name|n>] [--seconds 5] [--audio none|synthetic] [--json]
  patterns [--json]
  config validate [<file>] [--json]
  config defaults

Run "zonelight <command> --help" to learn more about a command.`);
};

const printRunUsage = () => {
  console.log(`zonelight run

Connect to the host, create the lights and animate them until interrupted.
Type a pattern number or name, next, prev, list, status or quit on stdin.

Optional:
  --config <file>        Configuration file (default ./zonelight.config.json)
  --pattern <name|n>     Starting pattern (name or number from "zonelight patterns")
  --audio <mode>         none | synthetic | file | pulse | alsa
  --file <path>          Audio file to loop (implies --audio file)
  --device <name>        Capture device for pulse/alsa
  --url <ws-url>         Host WebSocket endpoint
  --rate <hz>            Light updates per second
  --port <number>        Serve HTTP pattern control on this port
  --no-stdin             Ignore stdin commands
  -i, --interactive      Ask for the number of lights in each zone before starting
`);
};

const printSimulateUsage = () => {
  console.log(`zonelight simulate

Run the light loop against an in-memory host and print what it would send.

Optional:
  --config <file>        Configuration file (default ./zonelight.config.json)
  --pattern <name|n>     Pattern to run
  --seconds <number>     Run time (default 5)
  --audio <mode>         none | synthetic (default synthetic)
  --json                 Emit the summary as JSON
`);
};

const printConfigUsage = () => {
  console.log(`zonelight config – configuration utilities

Usage:
  zonelight config validate [<file>] [--json]
  zonelight config defaults
`);
};

const readValue = (args: string[], index: number, flag: string): string => {
  const value = args[index];
  if (value === undefined || value.startsWith('--')) {
    return exitWithError(`${flag} requires a value.`);
  }
  return value;
};

const readNumberValue = (args: string[], index: number, flag: string): number => {
  const raw = readValue(args, index, flag);
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    return exitWithError(`${flag} expects a number (got "${raw}").`);
  }
  return value;
};

const reportLoadFailure = (result: Extract<ConfigLoadResult, { kind: 'error' }>): never => {
  console.error(`✖ Configuration invalid${result.sourceName ? `: ${result.sourceName}` : ''}`);
  console.error(`  ${result.message}`);
  result.issues?.forEach((issue) => {
    console.error(`   • ${formatIssue(issue)}`);
  });
  process.exit(1);
};

const loadOrExit = async (path: string | undefined, overrides: ConfigOverrides): Promise<ZonelightConfig> => {
  const result = await loadConfig({ path, overrides });
  if (result.kind === 'error') {
    return reportLoadFailure(result);
  }
  result.issues.forEach((issue) => {
    console.warn(`[config] ${formatIssue(issue)}`);
  });
  return result.config;
};

const describeStartupError = (error: unknown): string => {
  if (error instanceof TransportError) return `[transport] ${error.operation} failed: ${error.message}`;
  if (error instanceof AudioSourceError) return `[audio] ${error.message}`;
  if (error instanceof ConfigurationError) return `[config] ${error.message}`;
  return `[session] ${describeError(error)}`;
};

const handleRunCommand = async (args: string[]) => {
  if (args.includes('--help') || args.includes('-h')) {
    printRunUsage();
    process.exit(0);
  }

  let configPath: string | undefined;
  let useStdin = true;
  let interactive = false;
  const overrides: {
    defaultPattern?: string;
    updateRate?: number;
    layout?: Record<string, unknown>;
    audio: Record<string, unknown>;
    transport: Record<string, unknown>;
    control: Record<string, unknown>;
  } = { audio: {}, transport: {}, control: {} };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--config':
        configPath = readValue(args, ++i, arg);
        break;
      case '--pattern':
        overrides.defaultPattern = readValue(args, ++i, arg);
        break;
      case '--audio':
        overrides.audio.source = readValue(args, ++i, arg);
        break;
      case '--file':
        overrides.audio.source = 'file';
        overrides.audio.path = readValue(args, ++i, arg);
        break;
      case '--device':
        overrides.audio.device = readValue(args, ++i, arg);
        break;
      case '--url':
        overrides.transport.url = readValue(args, ++i, arg);
        break;
      case '--rate':
        overrides.updateRate = readNumberValue(args, ++i, arg);
        break;
      case '--port':
        overrides.control.port = readNumberValue(args, ++i, arg);
        break;
      case '--no-stdin':
        useStdin = false;
        break;
      case '--interactive':
      case '-i':
        interactive = true;
        break;
      default:
        exitWithError(`Unknown flag "${arg}"`);
    }
  }

  if (interactive) {
    overrides.layout = await promptZoneCounts(process.stdin, process.stdout);
  }
  const config = await loadOrExit(configPath, overrides);
  const needsFfmpeg = config.audio.source === 'file' || config.audio.source === 'pulse' || config.audio.source === 'alsa';
  if (needsFfmpeg && !(await probeFfmpeg(config.audio.ffmpeg))) {
    exitWithError(`[audio] "${config.audio.ffmpeg}" is not runnable; install ffmpeg or use --audio none`);
  }
  let transport: LinkTransport;
  try {
    transport = await LinkTransport.connect({ ...config.transport });
  } catch (error) {
    return exitWithError(describeStartupError(error));
  }

  let session: LightSession;
  try {
    session = await LightSession.start(config, {
      transport,
      input: useStdin ? process.stdin : undefined,
    });
  } catch (error) {
    await transport.close();
    return exitWithError(describeStartupError(error));
  }

  const detachSignals = stopOnSignals(session);
  const summary = await session.done;
  detachSignals();
  reportTeardown(summary);
  process.exit(0);
};

const handleSimulateCommand = async (args: string[]) => {
  if (args.includes('--help') || args.includes('-h')) {
    printSimulateUsage();
    process.exit(0);
  }

  let configPath: string | undefined;
  let seconds = 5;
  let json = false;
  const overrides: { defaultPattern?: string; audio: Record<string, unknown>; control: Record<string, unknown> } = {
    audio: { source: 'synthetic' },
    control: { port: null },
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--config':
        configPath = readValue(args, ++i, arg);
        break;
      case '--pattern':
        overrides.defaultPattern = readValue(args, ++i, arg);
        break;
      case '--seconds':
        seconds = readNumberValue(args, ++i, arg);
        break;
      case '--audio': {
        const mode = readValue(args, ++i, arg);
        if (mode !== 'none' && mode !== 'synthetic') {
          exitWithError('simulate supports --audio none or synthetic.');
        }
        overrides.audio.source = mode;
        break;
      }
      case '--json':
        json = true;
        break;
      default:
        exitWithError(`Unknown flag "${arg}"`);
    }
  }

  const config = await loadOrExit(configPath, overrides);
  const quiet = { log: () => undefined, warn: console.warn, error: console.error };
  let summary: SimulationSummary;
  try {
    summary = await simulateSession(config, {
      seconds,
      logger: json ? quiet : console,
      attach: (session) => stopOnSignals(session),
    });
  } catch (error) {
    return exitWithError(describeStartupError(error));
  }

  if (json) {
    console.log(JSON.stringify({ status: 'ok', ...summary }, null, 2));
    return;
  }
  formatSimulation(summary, seconds).forEach((line) => {
    console.log(line);
  });
};

const handlePatternsCommand = (args: string[]) => {
  if (args.includes('--json')) {
    console.log(JSON.stringify({ status: 'ok', patterns: listPatterns() }, null, 2));
    return;
  }
  console.log(formatPatternList());
};

const handleConfigCommand = async (args: string[]) => {
  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    printConfigUsage();
    process.exit(0);
  }
  const [subcommand, ...rest] = args;
  if (subcommand === 'defaults') {
    console.log(JSON.stringify(DEFAULT_CONFIG, null, 2));
    return;
  }
  if (subcommand !== 'validate') {
    exitWithError(`Unknown config subcommand "${subcommand}".`);
  }

  const flags = new Set(rest.filter((arg) => arg.startsWith('--')));
  const file = rest.find((arg) => !arg.startsWith('--'));
  const result = await loadConfig({ path: file });
  if (flags.has('--json')) {
    console.log(JSON.stringify({ status: result.kind === 'success' ? 'ok' : 'error', ...result }, null, 2));
    if (result.kind === 'error') process.exit(1);
    return;
  }
  if (result.kind === 'error') {
    reportLoadFailure(result);
    return;
  }
  const { config } = result;
  const lights = ZONES.reduce((sum, zone) => sum + config.layout.counts[zone], 0);
  console.log(`✔ Configuration valid: ${result.sourceName ?? 'built-in defaults'}`);
  console.log(`  lights:  ${lights} at ${config.updateRate} Hz, pattern ${config.defaultPattern}`);
  console.log(`  audio:   ${config.audio.source}`);
  console.log(`  host:    ${config.transport.url}`);
  result.issues.forEach((issue) => {
    console.warn(`  • ${formatIssue(issue)}`);
  });
};

const main = async () => {
  const [, , ...argv] = process.argv;
  if (argv.length === 0 || argv[0] === '--help' || argv[0] === '-h') {
    printMainUsage();
    process.exit(0);
  }
  const [command, ...rest] = argv;
  switch (command) {
    case 'run':
      await handleRunCommand(rest);
      break;
    case 'simulate':
      await handleSimulateCommand(rest);
      break;
    case 'patterns':
      handlePatternsCommand(rest);
      break;
    case 'config':
      await handleConfigCommand(rest);
      break;
    default:
      exitWithError(`Unknown command "${command}".`);
  }
};

main().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
