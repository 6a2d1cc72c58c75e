import { describe, expect, it } from 'vitest';
import { DEFAULT_SETTINGS } from '../../test/fakes';
import { evaluateHumidity, evaluateTemperature, hysteresisAction } from './thresholds';

describe('evaluateTemperature', () => {
  const target = 22;

  it('should raise a critical high_temp above target + 5', () => {
    expect(evaluateTemperature(28, target, DEFAULT_SETTINGS)).toEqual({
      alertType: 'high_temp',
      severity: 'critical',
      message: 'Critical temperature: 28.0°C (limit: 27.0°C)',
    });
  });

  it('should treat exactly target + 5 as a warning, not critical', () => {
    expect(evaluateTemperature(27, target, DEFAULT_SETTINGS)).toEqual({
      alertType: 'high_temp',
      severity: 'warning',
      message: 'High temperature: 27.0°C (setpoint: 22.0°C)',
    });
  });

  it('should raise a warning just above target + 2', () => {
    expect(evaluateTemperature(24.1, target, DEFAULT_SETTINGS)?.severity).toBe('warning');
  });

  it('should not alert at exactly target + 2', () => {
    expect(evaluateTemperature(24, target, DEFAULT_SETTINGS)).toBeNull();
  });

  it('should raise a low_temp warning below target - 3', () => {
    expect(evaluateTemperature(18.5, target, DEFAULT_SETTINGS)).toEqual({
      alertType: 'low_temp',
      severity: 'warning',
      message: 'Low temperature: 18.5°C (setpoint: 22.0°C)',
    });
  });

  it('should not alert at exactly target - 3', () => {
    expect(evaluateTemperature(19, target, DEFAULT_SETTINGS)).toBeNull();
  });

  it('should follow a configured critical threshold', () => {
    const result = evaluateTemperature(26, target, { ...DEFAULT_SETTINGS, temperatureCriticalThreshold: 3 });
    expect(result?.severity).toBe('critical');
    expect(result?.message).toBe('Critical temperature: 26.0°C (limit: 25.0°C)');
  });
});

describe('evaluateHumidity', () => {
  it('should warn above target + 15', () => {
    expect(evaluateHumidity(66, 50, DEFAULT_SETTINGS)).toEqual({
      alertType: 'high_humidity',
      severity: 'warning',
      message: 'High humidity: 66.0% (limit: 65.0%)',
    });
  });

  it('should not alert at the limit or below', () => {
    expect(evaluateHumidity(65, 50, DEFAULT_SETTINGS)).toBeNull();
    expect(evaluateHumidity(10, 50, DEFAULT_SETTINGS)).toBeNull();
  });
});

describe('hysteresisAction', () => {
  it('should turn on above the band', () => {
    expect(hysteresisAction(23.5, 22, 1)).toBe('turn_on');
  });

  it('should turn off below the band', () => {
    expect(hysteresisAction(20.5, 22, 1)).toBe('turn_off');
  });

  it('should do nothing inside or on the edge of the band', () => {
    expect(hysteresisAction(22, 22, 1)).toBe('none');
    expect(hysteresisAction(23, 22, 1)).toBe('none');
    expect(hysteresisAction(21, 22, 1)).toBe('none');
  });
});
