import {
  ACCEPT_ENCODING,
  AcceptEncoding,
  Headers,
  HttpError,
  parseEncoding,
  type Encoding,
} from '@encoding-negotiation/accept-encoding';
import dotenv from 'dotenv';
import loglevel from 'loglevel';
import yargs from 'yargs';
import { z } from 'zod';
import { resolveContentEncoding } from './middleware.js';

// Constants and setup
// -------------------

dotenv.config();

const env = z
  .object({
    AVAILABLE_ENCODINGS: z.string().default('br,gzip,deflate,identity'),
    LOG_LEVEL: z
      .enum(['trace', 'debug', 'info', 'warn', 'error'])
      .default('info'),
  })
  .parse(process.env);

loglevel.setLevel(env.LOG_LEVEL);
const log = loglevel.getLogger('main');

export function parseEncodingList(list: string): Encoding[] {
  return list
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name !== '')
    .map(parseEncoding);
}

// Command handlers
// ----------------

type NegotiateParameter = {
  header?: string[] | undefined;
  available: string;
};
export function negotiateCommand({
  header,
  available,
}: NegotiateParameter): string {
  let headers = new Headers();
  for (let value of header ?? []) {
    headers.append(ACCEPT_ENCODING, value);
  }
  return resolveContentEncoding(headers, parseEncodingList(available)).value();
}

type FormatParameter = { header: string[]; sort?: boolean | undefined };
export function formatCommand({ header, sort = false }: FormatParameter) {
  let accept = AcceptEncoding.parse(header);
  if (sort) accept.sort();
  return accept.value();
}

// Command line interface
// ----------------------

export function cli(args: string[] = process.argv.slice(2)) {
  yargs(args)
    .command(
      'negotiate',
      'Print the content coding to use for an Accept-Encoding header',
      (yargs) =>
        yargs
          .option('header', {
            alias: 'H',
            desc:
              'Accept-Encoding value, repeat for several occurrences. ' +
              'Omit to negotiate without header',
            type: 'string',
            array: true,
          })
          .option('available', {
            alias: 'a',
            desc: 'Comma separated encodings the server supports, in order',
            type: 'string',
            default: env.AVAILABLE_ENCODINGS,
          })
          .strict()
          .help()
          .alias('help', 'h'),
      (argv) => run(() => negotiateCommand(argv)),
    )
    .command(
      'format',
      'Print an Accept-Encoding header as it is parsed',
      (yargs) =>
        yargs
          .option('header', {
            alias: 'H',
            desc: 'Accept-Encoding value, repeat for several occurrences',
            type: 'string',
            array: true,
            demandOption: true,
          })
          .option('sort', {
            alias: 's',
            desc: 'Sort the directives by weight',
            type: 'boolean',
            default: false,
          })
          .strict()
          .help()
          .alias('help', 'h'),
      (argv) => run(() => formatCommand(argv)),
    )
    .demandCommand(1)
    .scriptName('accept-encoding')
    .usage('Usage: $0 <command> [options]')
    .help()
    .alias('help', 'h')
    .strict()
    .parse();
}

function run(command: () => string) {
  let output: string;
  try {
    output = command();
  } catch (error) {
    handleError(error);
    return;
  }
  process.stdout.write(`${output}\n`);
}

function handleError(error: unknown) {
  if (error instanceof HttpError) {
    log.error(`${error.message} (${error.status ?? 'no status'})`);
  } else {
    log.error(error);
  }
  process.exit(1);
}
