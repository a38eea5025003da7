import { FormatRegistry } from './FormatRegistry.js';
import { CUSTOM_FORMATS } from '../formats/custom.js';
import { LEGACY_FORMATS } from '../formats/legacy.js';
import type { MeasurementKind, SensorDescription } from '../types/index.js';

for (const f of [...CUSTOM_FORMATS, ...LEGACY_FORMATS]) FormatRegistry.register(f);

export const MANUFACTURER = 'ATC';
export const MODEL        = 'ATC sensor';

export const SENSOR_LIBRARY: Record<MeasurementKind, SensorDescription> = {
  temperature    : { key: 'temperature',     name: 'Temperature',     deviceClass: 'temperature',     unit: '°C'  },
  humidity       : { key: 'humidity',        name: 'Humidity',        deviceClass: 'humidity',        unit: '%'   },
  battery        : { key: 'battery',         name: 'Battery',         deviceClass: 'battery',         unit: '%'   },
  voltage        : { key: 'voltage',         name: 'Voltage',         deviceClass: 'voltage',         unit: 'V'   },
  signal_strength: { key: 'signal_strength', name: 'Signal Strength', deviceClass: 'signal_strength', unit: 'dBm' },
};
