// Custom (pvvx) advertising format, plain and encrypted.
import type { WireFormat } from '../types/index.js';
import { reversed } from '../util/bytes.js';
import { decryptFrame, reconcileMac, requireField, toRaw, viewOf } from './shared.js';

/**
 * 15 bytes, little-endian:
 * `mac[6] (reversed) | temp i16 ×0.01 | hum u16 ×0.01 | volt u16 mV | bat u8 | counter u8 | flags u8`
 */
export const customPlain: WireFormat = {
  id       : 'pvvx',
  length   : 15,
  layout   : 'custom',
  encrypted: false,
  firmware : 'ATC (pvvx)',
  reports  : ['temperature', 'humidity', 'voltage', 'battery'],

  decode(payload, ctx) {
    const mac  = reconcileMac(reversed(payload.subarray(0, 6)), ctx);
    const view = viewOf(payload);
    return {
      mac,
      temperature: view.getInt16(6, true) / 100,
      humidity   : view.getUint16(8, true) / 100,
      voltage    : view.getUint16(10, true) / 1000,
      battery    : payload[12],
      packetId   : payload[13],
      flags      : payload[14],
    };
  },

  encode(fields, { mac }) {
    const out  = new Uint8Array(15);
    const view = viewOf(out);
    out.set(reversed(mac), 0);
    view.setInt16(6, toRaw('temperature', fields.temperature, 100, -0x8000, 0x7fff), true);
    view.setUint16(8, toRaw('humidity', fields.humidity, 100, 0, 0xffff), true);
    view.setUint16(10, toRaw('voltage', requireField('voltage', fields.voltage), 1000, 0, 0xffff), true);
    out[12] = toRaw('battery', fields.battery, 1, 0, 0xff);
    out[13] = toRaw('counter', fields.counter ?? 0, 1, 0, 0xff);
    out[14] = toRaw('flags', fields.flags ?? 0, 1, 0, 0xff);
    return out;
  },
};

/**
 * 11 bytes: `subtype | AES-CCM(6) | tag[4]`, plaintext little-endian:
 * `temp i16 ×0.01 | hum u16 ×0.01 | bat u8 | flags u8`
 */
export const customEncrypted: WireFormat = {
  id       : 'pvvx-encrypted',
  length   : 11,
  layout   : 'custom',
  encrypted: true,
  firmware : 'ATC (pvvx encrypted)',
  reports  : ['temperature', 'humidity', 'battery'],

  decode(payload, ctx) {
    const plain = decryptFrame(payload, ctx, this.firmware, 6);
    const view  = viewOf(plain);
    return {
      mac        : ctx.transportMac,
      temperature: view.getInt16(0, true) / 100,
      humidity   : view.getUint16(2, true) / 100,
      battery    : plain[4],
      packetId   : payload[0],
      flags      : plain[5],
    };
  },

  encode(fields, { mac, cipher }) {
    const plain = new Uint8Array(6);
    const view  = viewOf(plain);
    view.setInt16(0, toRaw('temperature', fields.temperature, 100, -0x8000, 0x7fff), true);
    view.setUint16(2, toRaw('humidity', fields.humidity, 100, 0, 0xffff), true);
    plain[4] = toRaw('battery', fields.battery, 1, 0, 0xff);
    plain[5] = toRaw('flags', fields.flags ?? 0, 1, 0, 0xff);
    return cipher.encryptPayload(plain, toRaw('counter', fields.counter ?? 0, 1, 0, 0xff), mac);
  },
};

export const CUSTOM_FORMATS = [customPlain, customEncrypted] as const;

