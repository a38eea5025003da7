// atc1441 advertising format, plain and encrypted.
import type { WireFormat } from '../types/index.js';
import { decryptFrame, reconcileMac, requireField, toRaw, viewOf } from './shared.js';

/** Firmware may report more than 100 % in the 7-bit battery field. */
export const MAX_BATTERY = 100;

/**
 * 13 bytes, big-endian:
 * `mac[6] | temp i16 ×0.1 | hum u8 | bat u8 | volt u16 mV | counter u8`
 */
export const legacyPlain: WireFormat = {
  id       : 'atc1441',
  length   : 13,
  layout   : 'legacy',
  encrypted: false,
  firmware : 'ATC (atc1441)',
  reports  : ['temperature', 'humidity', 'voltage', 'battery'],

  decode(payload, ctx) {
    const mac  = reconcileMac(payload.slice(0, 6), ctx);
    const view = viewOf(payload);
    return {
      mac,
      temperature: view.getInt16(6, false) / 10,
      humidity   : payload[8],
      battery    : payload[9],
      voltage    : view.getUint16(10, false) / 1000,
      packetId   : payload[12],
    };
  },

  encode(fields, { mac }) {
    const out  = new Uint8Array(13);
    const view = viewOf(out);
    out.set(mac, 0);
    view.setInt16(6, toRaw('temperature', fields.temperature, 10, -0x8000, 0x7fff), false);
    out[8] = toRaw('humidity', fields.humidity, 1, 0, 0xff);
    out[9] = toRaw('battery', fields.battery, 1, 0, 0xff);
    view.setUint16(10, toRaw('voltage', requireField('voltage', fields.voltage), 1000, 0, 0xffff), false);
    out[12] = toRaw('counter', fields.counter ?? 0, 1, 0, 0xff);
    return out;
  },
};

/**
 * 8 bytes: `subtype | AES-CCM(3) | tag[4]`, plaintext:
 * `temp u8 (x/2 - 40) | hum u8 (x/2) | flag:1 bat:7`
 */
export const legacyEncrypted: WireFormat = {
  id       : 'atc1441-encrypted',
  length   : 8,
  layout   : 'legacy',
  encrypted: true,
  firmware : 'ATC (atc1441 encrypted)',
  reports  : ['temperature', 'humidity', 'battery'],

  decode(payload, ctx) {
    const plain = decryptFrame(payload, ctx, this.firmware, 3);
    return {
      mac        : ctx.transportMac,
      temperature: plain[0] / 2 - 40.0,
      humidity   : plain[1] / 2,
      battery    : Math.min(plain[2] & 0x7f, MAX_BATTERY),
      packetId   : payload[0],
      flags      : plain[2] >> 7,
    };
  },

  encode(fields, { mac, cipher }) {
    const plain = Uint8Array.of(
      toRaw('temperature', fields.temperature + 40, 2, 0, 0xff),
      toRaw('humidity', fields.humidity, 2, 0, 0xff),
      toRaw('battery', fields.battery, 1, 0, 0x7f) | (toRaw('flags', fields.flags ?? 0, 1, 0, 1) << 7),
    );
    return cipher.encryptPayload(plain, toRaw('counter', fields.counter ?? 0, 1, 0, 0xff), mac);
  },
};

export const LEGACY_FORMATS = [legacyPlain, legacyEncrypted] as const;
