import { readFileSync } from 'node:fs';
import { isStructuralError } from './errors.js';
import { parseAuto } from './format-detection.js';
import { parseJp2 } from './jp2-parser.js';
import { parseJpc } from './jpc-parser.js';
import type { ParseLogger, ParseTree } from './types.js';
import { encodeTree, type BinaryEncoding } from './xml/encoder.js';
import { writeXml } from './xml/writer.js';

export const VERSION = '0.1.0';

/** sysexits.h codes, so scripts can tell I/O failures from invalid files */
export const EXIT_OK = 0;
export const EXIT_USAGE = 64;
export const EXIT_DATA_ERROR = 65;
export const EXIT_NO_INPUT = 66;

type FormatChoice = 'auto' | 'jp2' | 'jpc';

interface CliOptions {
  format: FormatChoice;
  encoding: BinaryEncoding;
  spans: boolean;
  verbose: boolean;
  quiet: boolean;
  help: boolean;
  version: boolean;
}

/**
 * Everything the CLI touches outside its own process state
 */
export interface CliIo {
  stdout(text: string): void;
  stderr(text: string): void;
  readFile(path: string): Uint8Array;
}

const HELP = `Usage: jp2xml [options] <file>

Print the box and marker structure of a JPEG 2000 file (JP2 or bare
codestream) as XML.

Options:
  --format <auto|jp2|jpc>  Input format (default: auto)
  --hex                    Encode opaque data as hex instead of base64
  --no-spans               Omit offset/length attributes
  --verbose                Trace every box and marker on stderr
  --quiet                  Suppress warnings
  --help                   Show this help
  --version                Show version

Exit status:
  0   success
  64  usage error
  65  input is not structurally valid JPEG 2000
  66  input file missing or unreadable
`;

class UsageError extends Error {}

function parseArgs(args: readonly string[]): { inputs: string[]; options: CliOptions } {
  const inputs: string[] = [];
  const options: CliOptions = {
    format: 'auto',
    encoding: 'base64',
    spans: true,
    verbose: false,
    quiet: false,
    help: false,
    version: false
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else if (arg === '--version' || arg === '-V') {
      options.version = true;
    } else if (arg === '--verbose' || arg === '-v') {
      options.verbose = true;
    } else if (arg === '--quiet' || arg === '-q') {
      options.quiet = true;
    } else if (arg === '--hex') {
      options.encoding = 'hex';
    } else if (arg === '--no-spans') {
      options.spans = false;
    } else if (arg === '--format' || arg.startsWith('--format=')) {
      const value = arg === '--format' ? args[++i] : arg.slice('--format='.length);
      if (value !== 'auto' && value !== 'jp2' && value !== 'jpc') {
        throw new UsageError(`--format expects auto, jp2 or jpc, got ${value === undefined ? 'nothing' : JSON.stringify(value)}`);
      }
      options.format = value;
    } else if (!arg.startsWith('-')) {
      inputs.push(arg);
    } else {
      throw new UsageError(`unknown option ${arg}`);
    }
  }

  return { inputs, options };
}

function parse(format: FormatChoice, data: Uint8Array, logger: ParseLogger): ParseTree {
  switch (format) {
    case 'jp2':
      return parseJp2(data, { logger });
    case 'jpc':
      return parseJpc(data, { logger });
    case 'auto':
      return parseAuto(data, { logger });
  }
}

const nodeIo: CliIo = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
  readFile: (path) => readFileSync(path)
};

/**
 * Run the command line and return its exit status
 */
export function runCli(argv: readonly string[], io: CliIo = nodeIo): number {
  let parsed: { inputs: string[]; options: CliOptions };
  try {
    parsed = parseArgs(argv);
  } catch (err) {
    if (err instanceof UsageError) {
      io.stderr(`jp2xml: ${err.message}\n${HELP}`);
      return EXIT_USAGE;
    }
    throw err;
  }
  const { inputs, options } = parsed;

  if (options.help) {
    io.stdout(HELP);
    return EXIT_OK;
  }
  if (options.version) {
    io.stdout(`${VERSION}\n`);
    return EXIT_OK;
  }
  if (inputs.length !== 1) {
    io.stderr(`jp2xml: expected exactly one input file, got ${inputs.length}\n${HELP}`);
    return EXIT_USAGE;
  }

  const [path] = inputs;
  let data: Uint8Array;
  try {
    data = io.readFile(path);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    io.stderr(`jp2xml: cannot read ${path}: ${reason}\n`);
    return EXIT_NO_INPUT;
  }

  const logger: ParseLogger = {
    warn: (message) => {
      if (!options.quiet) io.stderr(`jp2xml: warning: ${message}\n`);
    },
    debug: options.verbose ? (message) => io.stderr(`jp2xml: ${message}\n`) : undefined
  };

  let tree: ParseTree;
  try {
    tree = parse(options.format, data, logger);
  } catch (err) {
    if (isStructuralError(err)) {
      io.stderr(`jp2xml: ${path}: ${err.message}\n`);
      return EXIT_DATA_ERROR;
    }
    throw err;
  }

  const root = encodeTree(tree, data, { binaryEncoding: options.encoding, includeSpans: options.spans });
  io.stdout(writeXml(root));
  return EXIT_OK;
}
