import '../../src/config/formats.js';
import { FormatRegistry } from '../../src/config/FormatRegistry.js';
import { legacyPlain } from '../../src/formats/legacy.js';
import { FormatError, UnrecognizedFormatError } from '../../src/errors/index.js';
import { describeFormats } from '../../src/index.js';

describe('FormatRegistry', () => {
  it('dispatches by payload length', () => {
    expect(FormatRegistry.get(15).id).toBe('pvvx');
    expect(FormatRegistry.get(13).id).toBe('atc1441');
    expect(FormatRegistry.get(11).id).toBe('pvvx-encrypted');
    expect(FormatRegistry.get(8).id).toBe('atc1441-encrypted');
  });

  it('throws on unknown lengths', () => {
    expect(() => FormatRegistry.get(14)).toThrow(UnrecognizedFormatError);
    expect(FormatRegistry.has(14)).toBe(false);
  });

  it('finds formats by id', () => {
    expect(FormatRegistry.byId('atc1441-encrypted').length).toBe(8);
  });

  it('prevents duplicate registration', () => {
    expect(() => FormatRegistry.register({ ...legacyPlain, id: 'pvvx' })).toThrow(FormatError);
    expect(FormatRegistry.get(13)).toBe(legacyPlain);
  });

  it('lists the formats longest first', () => {
    expect(FormatRegistry.list().map(f => f.length)).toEqual([15, 13, 11, 8]);
  });

  it('describes the formats', () => {
    expect(describeFormats()).toEqual([
      { id: 'pvvx',              length: 15, layout: 'custom', encrypted: false, firmware: 'ATC (pvvx)' },
      { id: 'atc1441',           length: 13, layout: 'legacy', encrypted: false, firmware: 'ATC (atc1441)' },
      { id: 'pvvx-encrypted',    length: 11, layout: 'custom', encrypted: true,  firmware: 'ATC (pvvx encrypted)' },
      { id: 'atc1441-encrypted', length: 8,  layout: 'legacy', encrypted: true,  firmware: 'ATC (atc1441 encrypted)' },
    ]);
  });
});
