import type { AtcCcmCipher } from '../algorithms/aes-ccm/AtcCcmCipher.js';
import type { DecodeError } from '../errors/index.js';

/* ------------------------- Advertisement ----------------------------- */

/** One received advertisement, as handed over by the scanning layer. */
export interface ServiceInfo {
  /** `AA:BB:CC:DD:EE:FF`, `AA-BB-…`, or an opaque platform identifier. */
  readonly address     : string;
  readonly name?       : string | null;
  readonly rssi        : number;
  /** Service UUID → raw service data. */
  readonly serviceData : Readonly<Record<string, Uint8Array>>;
}

/* ------------------------- Measurements ------------------------------ */

/** Measurements unpacked from the payload itself. */
export type FrameMeasurement =
  | 'temperature'
  | 'humidity'
  | 'battery'
  | 'voltage';

export type MeasurementKind = FrameMeasurement | 'signal_strength';

export type DeviceClass = MeasurementKind;
export type Unit = '°C' | '%' | 'V' | 'dBm';

export interface SensorDescription {
  readonly key         : MeasurementKind;
  readonly name        : string;
  readonly deviceClass : DeviceClass;
  readonly unit        : Unit;
}

export type Measurements = Partial<Record<MeasurementKind, number>>;

export interface DeviceInfo {
  name         : string;
  manufacturer : string;
  model        : string;
  swVersion    : string;
}

/** Output of one successful decode. */
export interface SensorUpdate {
  title        : string;
  firmware     : string;
  device       : DeviceInfo;
  measurements : Measurements;
  descriptions : Partial<Record<MeasurementKind, SensorDescription>>;
}

export type DecodeResult =
  | { ok: true;  update: SensorUpdate }
  | { ok: false; error: DecodeError };

/* ------------------------- Wire formats ------------------------------ */

export type FormatId =
  | 'pvvx'
  | 'atc1441'
  | 'pvvx-encrypted'
  | 'atc1441-encrypted';

export type Layout = 'custom' | 'legacy';

/** Fields unpacked from one payload, before they become measurements. */
export interface Frame {
  /** True sender MAC, natural byte order. */
  mac          : Uint8Array;
  temperature  : number;
  humidity     : number;
  battery      : number;
  voltage?     : number;
  packetId?    : number;
  /** Trigger/flag bits; unpacked but not reported. */
  flags?       : number;
}

export interface DecodeContext {
  /** MAC from the transport layer; all zeros when the address is not a MAC. */
  transportMac  : Uint8Array;
  /** False on platforms that report an opaque identifier instead of the MAC. */
  trustTransport: boolean;
  cipher        : AtcCcmCipher;
}

/** Values to pack into a payload. */
export interface FrameFields {
  temperature : number;
  humidity    : number;
  battery     : number;
  voltage?    : number;
  /** Packet counter; for encrypted layouts this is the leading subtype byte. */
  counter?    : number;
  flags?      : number;
}

export interface EncodeContext {
  mac    : Uint8Array;
  cipher : AtcCcmCipher;
}

/* ---------------------------------------------------------------------
   Descriptor of one wire format, keyed by its payload length.
--------------------------------------------------------------------- */
export interface WireFormat {
  readonly id        : FormatId;
  readonly length    : number;
  readonly layout    : Layout;
  readonly encrypted : boolean;
  readonly firmware  : string;
  /** Kinds this format reports (signal strength is added by the decoder). */
  readonly reports   : readonly FrameMeasurement[];
  decode(payload: Uint8Array, ctx: DecodeContext): Frame;
  encode(fields: FrameFields, ctx: EncodeContext): Uint8Array;
}
