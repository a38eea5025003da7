import { AtcDecoder, hexDecode } from '../src/index.js';
import { nodeProvider } from '../../node-runtime/src/provider.js';
import type { SensorDescription, SensorUpdate } from '../src/types/index.js';
import { BINDKEY, RSSI, TITLE, VECTORS, serviceInfo } from './test.constants.js';

const DESCRIPTIONS: Record<string, SensorDescription> = {
  temperature    : { key: 'temperature',     name: 'Temperature',     deviceClass: 'temperature',     unit: '°C'  },
  humidity       : { key: 'humidity',        name: 'Humidity',        deviceClass: 'humidity',        unit: '%'   },
  battery        : { key: 'battery',         name: 'Battery',         deviceClass: 'battery',         unit: '%'   },
  voltage        : { key: 'voltage',         name: 'Voltage',         deviceClass: 'voltage',         unit: 'V'   },
  signal_strength: { key: 'signal_strength', name: 'Signal Strength', deviceClass: 'signal_strength', unit: 'dBm' },
};

function expected(firmware: string, measurements: Record<string, number>): SensorUpdate {
  const descriptions: Record<string, SensorDescription> = {};
  for (const k of Object.keys(measurements)) descriptions[k] = DESCRIPTIONS[k];
  return {
    title   : TITLE,
    firmware,
    device  : { name: TITLE, manufacturer: 'ATC', model: 'ATC sensor', swVersion: firmware },
    measurements,
    descriptions,
  };
}

describe('AtcDecoder - captured advertisements', () => {
  it('decodes atc1441 without encryption', () => {
    const dec = new AtcDecoder(nodeProvider);
    const res = dec.update(serviceInfo(VECTORS['atc1441']));
    expect(res).toEqual({
      ok: true,
      update: expected('ATC (atc1441)', {
        temperature: 27.4, humidity: 47, battery: 100, voltage: 3.232, signal_strength: RSSI,
      }),
    });
  });

  it('decodes pvvx without encryption', () => {
    const dec = new AtcDecoder(nodeProvider);
    const res = dec.update(serviceInfo(VECTORS['pvvx']));
    expect(res).toEqual({
      ok: true,
      update: expected('ATC (pvvx)', {
        temperature: 26.49, humidity: 50.37, battery: 31, voltage: 2.486, signal_strength: RSSI,
      }),
    });
  });

  it('decodes pvvx with encryption', () => {
    const dec = new AtcDecoder(nodeProvider, { bindkey: BINDKEY });
    const res = dec.update(serviceInfo(VECTORS['pvvx-encrypted']));
    expect(res).toEqual({
      ok: true,
      update: expected('ATC (pvvx encrypted)', {
        temperature: 23.45, humidity: 41.73, battery: 61, signal_strength: RSSI,
      }),
    });
    expect(dec.bindkeyVerified).toBe(true);
  });

  it('decodes atc1441 with encryption', () => {
    const dec = new AtcDecoder(nodeProvider, { bindkey: BINDKEY });
    const res = dec.update(serviceInfo(VECTORS['atc1441-encrypted']));
    expect(res).toEqual({
      ok: true,
      update: expected('ATC (atc1441 encrypted)', {
        temperature: 26.5, humidity: 47, battery: 100, signal_strength: RSSI,
      }),
    });
    expect(dec.bindkeyVerified).toBe(true);
  });

  it('accepts the bindkey as bytes', () => {
    const key = hexDecode(BINDKEY);
    const dec = new AtcDecoder(nodeProvider, { bindkey: key });
    expect(dec.update(serviceInfo(VECTORS['pvvx-encrypted'])).ok).toBe(true);
  });

  it('accepts dash-delimited addresses', () => {
    const dec = new AtcDecoder(nodeProvider);
    const res = dec.update(serviceInfo(VECTORS['pvvx'], { address: 'a4-c1-38-8d-18-b2' }));
    expect(res.ok).toBe(true);
    expect(dec.mac).toBe('A4:C1:38:8D:18:B2');
  });

  it('names the device after the address when no local name is known', () => {
    const dec = new AtcDecoder(nodeProvider);
    const res = dec.update(serviceInfo(VECTORS['atc1441'], { name: undefined }));
    if (!res.ok) throw res.error;
    expect(res.update.title).toBe('ATC 18B2 (A4:C1:38:8D:18:B2)');
    expect(res.update.device.name).toBe('ATC 18B2 (A4:C1:38:8D:18:B2)');
  });

  it('identifies formats by payload length', () => {
    expect(AtcDecoder.identify(VECTORS['pvvx'])?.id).toBe('pvvx');
    expect(AtcDecoder.identify(VECTORS['atc1441-encrypted'])?.id).toBe('atc1441-encrypted');
    expect(AtcDecoder.identify(new Uint8Array(12))).toBeNull();
    expect(AtcDecoder.isSupportedPayload(new Uint8Array(11))).toBe(true);
    expect(AtcDecoder.isSupportedPayload(new Uint8Array(0))).toBe(false);
  });
});
