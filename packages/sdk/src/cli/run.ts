/**
 * Argument parsing and command dispatch for the docsign CLI.
 *
 * @module cli/run
 */

import { createLogger, type Logger } from '../utils/logger.js';
import { loadDocsignConfig } from './config.js';
import { keygenCommand, pubkeyCommand, signCommand, verifyCommand, type CommandContext } from './sign-commands.js';

export const VERSION = '0.1.0';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export const HELP_TEXT = `
docsign - Document signing and verification (RSA-2048, SHA-256, PKCS#1 v1.5)

Usage:
  docsign <command> [options]

Commands:
  keygen [dir]                      Generate a key pair (private_key.pem, public_key.pem)
  pubkey                            Export the public key of a private key
  sign <document>                   Sign a document, writing <document>.sig
  verify <document>                 Verify a document's signature
  version                           Show version information
  help                              Show this help message

Global Options:
  --config <file>   Config file (default: ./docsign.config.yaml if present)
  --json            Output as JSON
  --verbose         Debug logging
  --quiet, -q       Only log errors
  --help, -h        Show help

Command Options:
  keygen:
    --force, -f         Overwrite existing key files

  pubkey:
    --key <file>        Private key (default: configured private key)
    --out <file>        Write the PEM to a file instead of stdout

  sign:
    --key <file>        Private key (default: configured private key)
    --out <file>        Signature output (default: <document>.sig)

  verify:
    --key <file>        Public key (default: configured public key)
    --sig <file>        Signature file (default: <document>.sig)
    --signature <b64>   Signature given inline as base64

Exit Codes:
  0  Success (signature valid)
  1  Failure (invalid signature, unreadable key or document)
  2  Usage error (invalid arguments)

Examples:
  docsign keygen ./keys
  docsign sign contract.pdf --key ./keys/private_key.pem
  docsign verify contract.pdf --key ./keys/public_key.pem
  docsign verify contract.pdf --signature "$(cat contract.pdf.sig)"
`;

export interface ParsedArgs {
  command: string;
  positionals: string[];
  flags: Record<string, boolean>;
  options: Record<string, string>;
  /** Short flags with no meaning, as given (e.g. `-x`) */
  unknown: string[];
}

const VALUE_FLAGS = new Set(['config', 'key', 'out', 'sig', 'signature']);

const GLOBAL_FLAGS = ['json', 'verbose', 'quiet', 'help', 'version'];
const GLOBAL_OPTIONS = ['config'];

/** Flags and valued options each command takes besides the global ones. */
const COMMAND_ARGS: Record<string, { flags: string[]; options: string[] }> = {
  '': { flags: [], options: [] },
  keygen: { flags: ['force'], options: [] },
  pubkey: { flags: [], options: ['key', 'out'] },
  sign: { flags: [], options: ['key', 'out'] },
  verify: { flags: [], options: ['key', 'sig', 'signature'] },
};

/**
 * Split argv into command, positionals, boolean flags and valued options.
 *
 * A valued flag with no following argument is recorded as a boolean flag,
 * which the dispatcher reports as a usage error.
 */
export function parseArgs(args: string[]): ParsedArgs {
  const flags: Record<string, boolean> = {};
  const options: Record<string, string> = {};
  const positionals: string[] = [];
  const unknown: string[] = [];
  let command = '';

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      const flag = arg.slice(2);
      if (VALUE_FLAGS.has(flag) && i + 1 < args.length) {
        options[flag] = args[++i];
      } else {
        flags[flag] = true;
      }
    } else if (arg.startsWith('-') && arg.length > 1) {
      for (const f of arg.slice(1).split('')) {
        switch (f) {
          case 'f': flags['force'] = true; break;
          case 'q': flags['quiet'] = true; break;
          case 'h': flags['help'] = true; break;
          default: unknown.push(`-${f}`);
        }
      }
    } else if (!command) {
      command = arg;
    } else {
      positionals.push(arg);
    }
  }

  return { command, positionals, flags, options, unknown };
}

export interface RunCliOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Use this logger instead of one built from config and flags */
  logger?: Logger;
}

/**
 * Run the CLI and return its exit code.
 */
export async function runCli(args: string[], runOptions: RunCliOptions = {}): Promise<number> {
  const { command, positionals, flags, options, unknown } = parseArgs(args);

  if (flags['help'] || command === 'help') {
    console.log(HELP_TEXT);
    return EXIT_SUCCESS;
  }

  if (flags['version'] || command === 'version') {
    console.log(`docsign v${VERSION}`);
    return EXIT_SUCCESS;
  }

  const missingValue = [...VALUE_FLAGS].find((flag) => flags[flag]);
  if (missingValue) {
    console.error(`Option --${missingValue} requires a value`);
    return EXIT_USAGE;
  }

  const usageError = checkArguments(command, flags, options, unknown);
  if (usageError) {
    console.error(usageError);
    console.error('Run "docsign help" for usage information.');
    return EXIT_USAGE;
  }

  const config = loadDocsignConfig({ cwd: runOptions.cwd, configPath: options['config'], env: runOptions.env });
  const level = flags['verbose'] ? 'debug' : flags['quiet'] ? 'error' : config.logLevel;
  const context: CommandContext = { config, logger: runOptions.logger ?? createLogger(level) };
  context.logger.debug('Loaded configuration', { configPath: config.configPath, keysDir: config.keysDir });

  switch (command) {
    case 'keygen': {
      keygenCommand({ outputDir: positionals[0], force: flags['force'], json: flags['json'] }, context);
      return EXIT_SUCCESS;
    }

    case 'pubkey': {
      pubkeyCommand({ keyPath: options['key'], outputFile: options['out'], json: flags['json'] }, context);
      return EXIT_SUCCESS;
    }

    case 'sign': {
      if (positionals.length < 1) {
        console.error('Usage: docsign sign <document> [--key <private.pem>] [--out <file.sig>]');
        return EXIT_USAGE;
      }
      await signCommand(
        {
          documentPath: positionals[0],
          keyPath: options['key'],
          outputFile: options['out'],
          json: flags['json'],
        },
        context
      );
      return EXIT_SUCCESS;
    }

    case 'verify': {
      if (positionals.length < 1) {
        console.error('Usage: docsign verify <document> [--key <public.pem>] [--sig <file> | --signature <b64>]');
        return EXIT_USAGE;
      }
      const result = await verifyCommand(
        {
          documentPath: positionals[0],
          keyPath: options['key'],
          signaturePath: options['sig'],
          signature: options['signature'],
          json: flags['json'],
        },
        context
      );
      return result.valid ? EXIT_SUCCESS : EXIT_FAILURE;
    }

    case '': {
      console.log('docsign - Document signing and verification');
      console.log('');
      console.log('Run "docsign help" for usage information.');
      console.log('Run "docsign keygen" to create a key pair.');
      return EXIT_SUCCESS;
    }

    default: {
      console.error(`Unknown command: ${command}`);
      console.error('Run "docsign help" for usage information.');
      return EXIT_USAGE;
    }
  }
}

/**
 * Report the first flag or option the command does not take, or null.
 * Unknown commands are left to the dispatcher.
 */
export function checkArguments(
  command: string,
  flags: Record<string, boolean>,
  options: Record<string, string>,
  unknown: string[]
): string | null {
  if (unknown.length > 0) {
    return `Unknown option ${unknown[0]}`;
  }

  if (!Object.hasOwn(COMMAND_ARGS, command)) return null;
  const accepted = COMMAND_ARGS[command];

  for (const flag of Object.keys(flags)) {
    if (GLOBAL_FLAGS.includes(flag) || accepted.flags.includes(flag)) continue;
    return isKnownArgument(flag)
      ? `Option --${flag} is not valid for ${command || 'this command'}`
      : `Unknown option --${flag}`;
  }
  for (const option of Object.keys(options)) {
    if (GLOBAL_OPTIONS.includes(option) || accepted.options.includes(option)) continue;
    return `Option --${option} is not valid for ${command || 'this command'}`;
  }
  return null;
}

function isKnownArgument(name: string): boolean {
  return Object.values(COMMAND_ARGS).some((args) => args.flags.includes(name) || args.options.includes(name));
}
