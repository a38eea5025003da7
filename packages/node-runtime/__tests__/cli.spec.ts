/* ------------------------------------------------------------------
   atc-beacon CLI, driven in-process through buildProgram()
   ------------------------------------------------------------------ */
import { CommanderError } from 'commander';
import { buildProgram, PKG_VERSION } from '../src/program.js';

const ADDRESS = 'A4:C1:38:8D:18:B2';
const BINDKEY = 'b9ea895fac7eea6d30532432a516f3a3';

interface RunResult { stdout: string; stderr: string; exitCode: number; code?: string }

function run(args: string[]): RunResult {
  const out: string[] = [];
  const err: string[] = [];
  const program = buildProgram(
    { stdout: s => out.push(s), stderr: s => err.push(s) },
    { exitOverride: true },
  );
  try {
    program.parse(args, { from: 'user' });
    return { stdout: out.join(''), stderr: err.join(''), exitCode: 0 };
  } catch (e) {
    if (!(e instanceof CommanderError)) throw e;
    return { stdout: out.join(''), stderr: err.join(''), exitCode: e.exitCode, code: e.code };
  }
}

describe('atc-beacon decode', () => {
  it('prints the sensor update as JSON', () => {
    const res = run(['decode', 'a4c1388d18b201122f640ca025', '-a', ADDRESS, '-n', 'ATC_8D18B2', '-r', '-60']);
    expect(res.exitCode).toBe(0);
    const update = JSON.parse(res.stdout);
    expect(update.title).toBe('ATC_8D18B2 (A4:C1:38:8D:18:B2)');
    expect(update.firmware).toBe('ATC (atc1441)');
    expect(update.measurements).toEqual({
      temperature: 27.4, humidity: 47, battery: 100, voltage: 3.232, signal_strength: -60,
    });
  });

  it('decrypts with --key', () => {
    const res = run(['decode', '11 d6 03 fb fa 7b 6d fb 1e 26 fd', '-a', ADDRESS, '-k', BINDKEY]);
    expect(res.exitCode).toBe(0);
    expect(JSON.parse(res.stdout).measurements).toEqual({
      temperature: 23.45, humidity: 41.73, battery: 61, signal_strength: 0,
    });
  });

  it('fails with the error name when the key is missing', () => {
    const res = run(['decode', '58e9e6556581b3f9', '-a', ADDRESS]);
    expect(res.exitCode).toBe(1);
    expect(res.code).toBe('atc.failure');
    expect(res.stdout).toBe('');
    expect(res.stderr).toBe('Error [MissingKeyError]: Encryption key not set and advertisement is encrypted\n');
  });

  it('logs to stderr with -vv', () => {
    const res = run(['-vv', 'decode', '58e9e6556581b3f9', '-a', ADDRESS]);
    expect(res.exitCode).toBe(1);
    expect(res.stderr).toBe(
      '2| Encryption key not set and advertisement is encrypted\n' +
      'Error [MissingKeyError]: Encryption key not set and advertisement is encrypted\n',
    );
  });

  it('refuses encrypted frames with --identifier-less', () => {
    const res = run(['decode', '58e9e6556581b3f9', '-a', 'some-uuid', '-k', BINDKEY, '--identifier-less']);
    expect(res.exitCode).toBe(1);
    expect(res.stderr).toMatch(/^Error \[PlatformUnsupportedError\]: /);
  });

  it('reports payloads of unknown length', () => {
    const res = run(['decode', '0102', '-a', ADDRESS]);
    expect(res.exitCode).toBe(1);
    expect(res.stderr).toBe('Error [UnrecognizedFormatError]: No wire format with payload length 2\n');
  });

  it('reports malformed hex', () => {
    const res = run(['decode', 'xyz', '-a', ADDRESS]);
    expect(res.exitCode).toBe(1);
    expect(res.stderr).toMatch(/^Error \[DecodingError\]: Invalid hex/);
  });

  it('requires --address', () => {
    const res = run(['decode', 'a4c1388d18b201122f640ca025']);
    expect(res.exitCode).toBe(1);
    expect(res.code).toBe('commander.missingMandatoryOptionValue');
  });

  it('rejects a non-numeric --rssi', () => {
    const res = run(['decode', 'a4c1388d18b201122f640ca025', '-a', ADDRESS, '-r', 'loud']);
    expect(res.exitCode).toBe(1);
    expect(res.code).toBe('commander.invalidArgument');
  });
});

describe('atc-beacon encode', () => {
  it('prints the payload as hex', () => {
    const res = run([
      'encode', 'atc1441', '-a', ADDRESS,
      '-t', '27.4', '-H', '47', '-b', '100', '--voltage', '3.232', '-c', '37',
    ]);
    expect(res.exitCode).toBe(0);
    expect(res.stdout).toBe('a4c1388d18b201122f640ca025\n');
  });

  it('round-trips an encrypted frame through decode', () => {
    const enc = run([
      'encode', 'pvvx-encrypted', '-a', ADDRESS, '-k', BINDKEY,
      '-t', '19.5', '-H', '60', '-b', '42', '-c', '3',
    ]);
    expect(enc.exitCode).toBe(0);
    const dec = run(['decode', enc.stdout.trim(), '-a', ADDRESS, '-k', BINDKEY, '-r', '-71']);
    expect(JSON.parse(dec.stdout).measurements).toEqual({
      temperature: 19.5, humidity: 60, battery: 42, signal_strength: -71,
    });
  });

  it('rejects unknown formats', () => {
    const res = run(['encode', 'xiaomi', '-a', ADDRESS, '-t', '1', '-H', '1', '-b', '1']);
    expect(res.exitCode).toBe(1);
    expect(res.code).toBe('commander.invalidArgument');
  });

  it('reports out-of-range fields', () => {
    const res = run(['encode', 'atc1441-encrypted', '-a', ADDRESS, '-k', BINDKEY, '-t', '20', '-H', '50', '-b', '200']);
    expect(res.exitCode).toBe(1);
    expect(res.stderr).toBe('Error [EncodingError]: battery out of range: 200\n');
  });
});

describe('atc-beacon misc', () => {
  it('lists the formats', () => {
    const res = run(['formats']);
    expect(JSON.parse(res.stdout).map((f: { id: string }) => f.id))
      .toEqual(['pvvx', 'atc1441', 'pvvx-encrypted', 'atc1441-encrypted']);
  });

  it('prints the version', () => {
    const res = run(['--version']);
    expect(res.exitCode).toBe(0);
    expect(res.code).toBe('commander.version');
    expect(res.stdout).toBe(`${PKG_VERSION}\n`);
  });
});
