// Fixed threshold rules evaluated against a room's setpoints.

import type { ThermalSettings } from '../config';
import type { AlertType, Severity } from '../types';

export type ThresholdBreach = {
  alertType: AlertType;
  severity: Severity;
  message: string;
};

export type ThresholdSettings = Pick<
  ThermalSettings,
  'temperatureCriticalThreshold' | 'temperatureWarningOffset' | 'temperatureLowOffset' | 'humidityHighOffset'
>;

const fmt = (n: number) => n.toFixed(1);

/**
 * At most one temperature breach per reading. Branches are checked in
 * order (critical high, warning high, low) and the first match wins.
 */
export function evaluateTemperature(
  temperature: number,
  target: number,
  s: ThresholdSettings
): ThresholdBreach | null {
  const criticalLimit = target + s.temperatureCriticalThreshold;

  if (temperature > criticalLimit) {
    return {
      alertType: 'high_temp',
      severity: 'critical',
      message: `Critical temperature: ${fmt(temperature)}°C (limit: ${fmt(criticalLimit)}°C)`,
    };
  }
  if (temperature > target + s.temperatureWarningOffset) {
    return {
      alertType: 'high_temp',
      severity: 'warning',
      message: `High temperature: ${fmt(temperature)}°C (setpoint: ${fmt(target)}°C)`,
    };
  }
  if (temperature < target - s.temperatureLowOffset) {
    return {
      alertType: 'low_temp',
      severity: 'warning',
      message: `Low temperature: ${fmt(temperature)}°C (setpoint: ${fmt(target)}°C)`,
    };
  }
  return null;
}

export function evaluateHumidity(humidity: number, target: number, s: ThresholdSettings): ThresholdBreach | null {
  const limit = target + s.humidityHighOffset;
  if (humidity > limit) {
    return {
      alertType: 'high_humidity',
      severity: 'warning',
      message: `High humidity: ${fmt(humidity)}% (limit: ${fmt(limit)}%)`,
    };
  }
  return null;
}

export type HysteresisAction = 'turn_on' | 'turn_off' | 'none';

/** Dead band of +/- `band` around the setpoint; no action inside it. */
export function hysteresisAction(temperature: number, target: number, band: number): HysteresisAction {
  if (temperature > target + band) return 'turn_on';
  if (temperature < target - band) return 'turn_off';
  return 'none';
}
