// packages/node-runtime/src/program.ts
import { Argument, Command, InvalidArgumentError, Option } from 'commander';
import {
  AtcBeaconError,
  describeFormats,
  hexDecode,
  hexEncode,
  isVerbosity,
  type DecodeResult,
  type FormatId,
  type Verbosity,
} from '../../core/src/index.js';
import { createDecoder, encode } from './index.js';

export const PKG_VERSION = '1.0.0'; // sync with root package.json

const FORMAT_IDS: readonly FormatId[] = ['pvvx', 'atc1441', 'pvvx-encrypted', 'atc1441-encrypted'];

/** Scan service UUID used as the service-data key for decoded payloads. */
const ENVIRONMENTAL_SENSING_UUID = '0000181a-0000-1000-8000-00805f9b34fb';

export interface CliIO {
  stdout(s: string): void;
  stderr(s: string): void;
}

export interface ProgramOptions {
  /** Throw CommanderError instead of exiting the process (tests). */
  exitOverride?: boolean;
}

interface GlobalOptions {
  verbose: number;
}

interface DecodeCmdOptions {
  address        : string;
  name?          : string;
  key?           : string;
  rssi           : number;
  identifierLess?: boolean;
}

interface EncodeCmdOptions {
  address     : string;
  temperature : number;
  humidity    : number;
  battery     : number;
  voltage?    : number;
  counter     : number;
  flags?      : number;
  key?        : string;
}

const defaultIO: CliIO = {
  stdout: s => process.stdout.write(s),
  stderr: s => process.stderr.write(s),
};

function parseNumber(v: string): number {
  const n = Number(v);
  if (v.trim() === '' || !Number.isFinite(n)) throw new InvalidArgumentError('Not a number.');
  return n;
}

function parseInteger(v: string): number {
  const n = parseNumber(v);
  if (!Number.isInteger(n)) throw new InvalidArgumentError('Not an integer.');
  return n;
}

function verbosityOf(program: Command): Verbosity {
  const { verbose } = program.opts<GlobalOptions>();
  const level = Math.min(verbose, 4);
  return isVerbosity(level) ? level : 0;
}

export function buildProgram(io: CliIO = defaultIO, cfg: ProgramOptions = {}): Command {
  const program = new Command();
  if (cfg.exitOverride) program.exitOverride();

  program
    .name('atc-beacon')
    .version(PKG_VERSION)
    .description(
      'Decode and build ATC thermometer advertisements\n' +
      describeFormats().map(f => `${f.length} bytes: ${f.firmware}`).join('\n'),
    )
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr })

    // verbosity (repeatable)
    .addOption(
      new Option('-v, --verbose', 'increase verbosity (use multiple times)')
        .default(0)
        .argParser<number>((_, previous) => previous + 1)
    );

  /** Report a library error the way the rest of the CLI does and exit 1. */
  const fail = (err: unknown): never => {
    if (err instanceof AtcBeaconError) {
      return program.error(`Error [${err.name}]: ${err.message}`, { exitCode: 1, code: 'atc.failure' });
    }
    throw err;
  };

  /* ------------------------------------------------------------------ */
  /*  decode                                                            */
  /* ------------------------------------------------------------------ */
  program
    .command('decode')
    .description('Decode one service-data payload given as hex')
    .argument('<payload>', 'payload bytes as hex (separators allowed)')
    .requiredOption('-a, --address <mac>', 'address reported by the scanner')
    .option('-n, --name <name>', 'local name of the device')
    .option('-k, --key <hex>', 'bindkey, 32 hex characters')
    .addOption(
      new Option('-r, --rssi <dBm>', 'signal strength')
        .argParser(parseInteger)
        .default(0)
    )
    .option('--identifier-less', 'address is an opaque platform identifier, not the MAC')
    .action((payload: string, o: DecodeCmdOptions) => {
      let result: DecodeResult;
      try {
        const decoder = createDecoder({
          bindkey: o.key,
          identifierTrustedFromTransport: !o.identifierLess,
          verbose: verbosityOf(program),
          logger: msg => io.stderr(msg + '\n'),
        });
        result = decoder.update({
          address: o.address,
          name: o.name,
          rssi: o.rssi,
          serviceData: { [ENVIRONMENTAL_SENSING_UUID]: hexDecode(payload) },
        });
      } catch (err) {
        return fail(err);
      }
      if (!result.ok) return fail(result.error);
      io.stdout(JSON.stringify(result.update, null, 2) + '\n');
    });

  /* ------------------------------------------------------------------ */
  /*  encode                                                            */
  /* ------------------------------------------------------------------ */
  program
    .command('encode')
    .description('Build the payload a sensor would broadcast, printed as hex')
    .addArgument(new Argument('<format>', 'wire format').choices(FORMAT_IDS))
    .requiredOption('-a, --address <mac>', 'sensor MAC address')
    .requiredOption('-t, --temperature <celsius>', 'temperature', parseNumber)
    .requiredOption('-H, --humidity <percent>', 'relative humidity', parseNumber)
    .requiredOption('-b, --battery <percent>', 'battery level', parseInteger)
    .option('--voltage <volts>', 'supply voltage (plaintext formats)', parseNumber)
    .addOption(
      new Option('-c, --counter <n>', 'packet counter / subtype byte')
        .argParser(parseInteger)
        .default(0)
    )
    .option('-f, --flags <n>', 'trigger flags', parseInteger)
    .option('-k, --key <hex>', 'bindkey for the encrypted formats')
    .action((format: FormatId, o: EncodeCmdOptions) => {
      let out: string;
      try {
        out = hexEncode(encode(format, {
          temperature: o.temperature,
          humidity: o.humidity,
          battery: o.battery,
          voltage: o.voltage,
          counter: o.counter,
          flags: o.flags,
        }, { address: o.address, bindkey: o.key }));
      } catch (err) {
        return fail(err);
      }
      io.stdout(out + '\n');
    });

  /* ------------------------------------------------------------------ */
  /*  formats                                                           */
  /* ------------------------------------------------------------------ */
  program
    .command('formats')
    .description('List the supported wire formats')
    .action(() => {
      io.stdout(JSON.stringify(describeFormats(), null, 2) + '\n');
    });

  return program;
}
