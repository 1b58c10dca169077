// packages/node-runtime/src/program.ts
import { Command, InvalidArgumentError, Option } from 'commander';
import {
  accessSync,
  constants as fsConstants,
  createWriteStream,
  existsSync,
  promises as fsp,
} from 'node:fs';
import { dirname, format, parse, resolve } from 'node:path';
import type { Readable, Writable } from 'node:stream';
import {
  FilesystemError,
  TapEncoder,
  WritableStreamSink,
  createLogger,
  encodeName,
  toVerbosity,
  type TapSummary,
} from '../../core/src/index.js';
import { fileInput, toWebReadable, toWebWritable } from './streamAdapter.js';

const PKG_VERSION = '1.0.0'; // sync with root package.json

const NAME_FIELD = 10;

/** Streams and working directory the CLI talks to. */
export interface CliIO {
  stdin : Readable;
  stdout: Writable;
  stderr: Writable;
  cwd   : string;
}

interface CliOptions {
  out?         : string;
  name?        : string;
  address      : number;
  truncateName : boolean;
  verbose      : number;
}

/* ------------------------------------------------------------------ */
/*  Argument helpers                                                   */
/* ------------------------------------------------------------------ */

/** Decimal, `0x`-prefixed or `$`-prefixed hex, within 0..65535. */
export function parseAddress(v: string): number {
  const s = v.trim();
  let n = NaN;
  if (/^\d+$/.test(s)) n = Number(s);
  else if (/^(0x|\$)[0-9a-f]+$/i.test(s)) n = parseInt(s.replace(/^(0x|\$)/i, ''), 16);

  if (!Number.isInteger(n) || n < 0 || n > 0xFFFF) {
    throw new InvalidArgumentError('Address must be an integer between 0 and 65535');
  }
  return n;
}

/** Base name of the input without extension, cut to the name field. */
export function defaultName(src: string): string {
  if (src === '-') return 'stdin';
  return parse(src).name.slice(0, NAME_FIELD);
}

/** Input path with its extension replaced by `.tap`. */
export function defaultOut(src: string): string {
  if (src === '-') return '-';
  const { dir, name, ext } = parse(src);
  if (ext.toLowerCase() === '.tap') return `${src}.tap`;
  return format({ dir, name, ext: '.tap' });
}

export function formatError(err: unknown): string {
  if (err instanceof Error) {
    return `Error [${err.name}]: ${err.message}\n`;
  }
  return `Error [Unknown]: ${String(err)}\n`;
}

function assertWritable(out: string, cwd: string): string | null {
  if (out === '-') return null;

  const absOut    = resolve(cwd, out);
  const targetDir = dirname(absOut);

  if (!existsSync(targetDir)) {
    throw new FilesystemError(`Output directory does not exist: ${targetDir}`);
  }
  try {
    accessSync(targetDir, fsConstants.W_OK);
  } catch {
    throw new FilesystemError('Output directory is not writeable');
  }
  return absOut;
}

/* ------------------------------------------------------------------ */
/*  Program                                                            */
/* ------------------------------------------------------------------ */

export function createProgram(io: CliIO): Command {
  const program = new Command();

  program
    .name('bin2tap')
    .version(PKG_VERSION)
    .description('Wrap a raw binary (machine code) into a ZX Spectrum .tap file')
    .argument('<src>', 'input binary; use - for STDIN')
    .configureOutput({
      writeOut: str => io.stdout.write(str),
      writeErr: str => io.stderr.write(str),
    })

    .addOption(
      new Option('-o, --out <file>', 'output file; - for STDOUT (default: input name with .tap)')
    )
    .addOption(
      new Option('-n, --name <name>', 'name stored in the tape header (default: input base name)')
    )
    .addOption(
      new Option('-a, --address <addr>', 'load address, decimal or 0x/$ hex')
        .argParser(parseAddress)
        .default(32768, '32768')
    )
    .addOption(
      new Option('--truncate-name', 'cut names longer than 10 characters instead of failing')
        .default(false)
    )

    // verbosity (repeatable)
    .addOption(
      new Option('-v, --verbose', 'increase verbosity (use multiple times)')
        .default(0)
        .argParser<number>((_, previous) => previous + 1)
    )

    .action(async (src: string, opts: CliOptions) => {
      if (src !== '-' && !existsSync(resolve(io.cwd, src))) {
        throw new FilesystemError(`Input file not found: ${src}`);
      }

      const out     = opts.out ?? defaultOut(src);
      const outPath = assertWritable(out, io.cwd);

      const name         = opts.name ?? defaultName(src);
      const nameOverflow = opts.truncateName ? 'truncate' : 'reject';
      // reject a bad name before the input is opened
      encodeName(name, nameOverflow);

      const toStderr = (msg: string) => { io.stderr.write(msg + '\n'); };
      const log      = createLogger(toVerbosity(opts.verbose), toStderr);
      const encoder  = new TapEncoder({
        nameOverflow,
        verbose     : log.level,
        logger      : toStderr,
      });

      const input = src === '-' ? toWebReadable(io.stdin) : fileInput(resolve(io.cwd, src));
      const file  = await encoder.prepare(input, {
        name,
        loadAddress: opts.address,
      });

      // only open the destination once the input is known to be valid
      const outStream = outPath === null ? io.stdout : createWriteStream(outPath);
      const sink      = new WritableStreamSink(toWebWritable(outStream));

      let summary: TapSummary;
      try {
        summary = await encoder.write(file, sink);
        await sink.close();
      } catch (err) {
        if (outPath !== null) {
          await sink.abort().catch((abortErr: unknown) =>
            log.log(3, `abort failed: ${String(abortErr)}`));
          await fsp.rm(outPath, { force: true });
        }
        throw err;
      }

      log.log(1, `${summary.bytesWritten} bytes written to ${outPath ?? 'STDOUT'}`);
    });

  return program;
}
