import type { IrTransmitter, TransmitResult } from '../src/adapters/irTransmitter';
import type { ThermalSettings } from '../src/config';
import type { EventKind, EventMessage, PubSubTransport } from '../src/realtime/events';
import { Notifier } from '../src/realtime/notifier';
import { AirConditionerService } from '../src/services/acService';
import { AlertService } from '../src/services/alertService';
import type { EscalationSink } from '../src/services/alertService';
import { IngestService } from '../src/services/ingestService';
import { ReadingService } from '../src/services/readingService';
import { SensorService } from '../src/services/sensorService';
import type { CommandType } from '../src/types';
import { MemoryThermalStore } from './memoryStore';

export const DEFAULT_SETTINGS: ThermalSettings = {
  temperatureCriticalThreshold: 5,
  temperatureWarningOffset: 2,
  temperatureLowOffset: 3,
  humidityHighOffset: 15,
  hysteresis: 1,
  alertCooldownMinutes: 5,
  alertEscalationMinutes: 30,
  sensorOfflineThresholdMinutes: 5,
  dataRetentionDays: 30,
  readingAggregationHours: 24,
  commandLogRetentionDays: 90,
  alertRetentionDays: 365,
  allowMissingIrCodes: true,
};

export class TestClock {
  constructor(private current: Date = new Date('2026-03-02T12:00:00.000Z')) {}

  now = (): Date => new Date(this.current.getTime());

  advanceMinutes(minutes: number): void {
    this.current = new Date(this.current.getTime() + minutes * 60_000);
  }

  minutesAgo(minutes: number): Date {
    return new Date(this.current.getTime() - minutes * 60_000);
  }
}

export type Published = { topic: string; message: EventMessage };

/** Captures every publish and reports one delivery each. */
export class RecordingTransport implements PubSubTransport {
  readonly published: Published[] = [];

  publish(topic: string, message: EventMessage): number {
    this.published.push({ topic, message });
    return 1;
  }

  ofType(kind: EventKind): Published[] {
    return this.published.filter((p) => p.message.type === kind);
  }
}

export type TransmitCall = { deviceId: string; signal: string; commandType: CommandType };

/** IR transmitter whose outcomes are queued by the test; defaults to success. */
export class ScriptedTransmitter implements IrTransmitter {
  readonly sent: TransmitCall[] = [];
  readonly recordings: Array<{ deviceId: string; commandType: CommandType }> = [];
  private readonly queued: TransmitResult[] = [];

  failNext(response = 'Timed out waiting for transmitter'): this {
    this.queued.push({ ok: false, response });
    return this;
  }

  async send(deviceId: string, signal: string, commandType: CommandType): Promise<TransmitResult> {
    this.sent.push({ deviceId, signal, commandType });
    return this.queued.shift() ?? { ok: true, response: 'OK' };
  }

  async enterRecordingMode(deviceId: string, commandType: CommandType): Promise<TransmitResult> {
    this.recordings.push({ deviceId, commandType });
    return this.queued.shift() ?? { ok: true, response: 'OK' };
  }
}

export class RecordingEscalationSink implements EscalationSink {
  readonly notified: string[] = [];
  failFor = new Set<string>();

  async notify(alert: { id: string }): Promise<void> {
    if (this.failFor.has(alert.id)) throw new Error('webhook returned 500');
    this.notified.push(alert.id);
  }
}

export type CoreOptions = {
  settings?: Partial<ThermalSettings>;
  escalation?: EscalationSink;
};

/** Wires every core component against in-memory collaborators. */
export function buildCore(opts: CoreOptions = {}) {
  const clock = new TestClock();
  const settings: ThermalSettings = { ...DEFAULT_SETTINGS, ...opts.settings };
  const store = new MemoryThermalStore(clock.now);
  const transport = new RecordingTransport();
  const notifier = new Notifier(transport);
  const transmitter = new ScriptedTransmitter();

  const alerts = new AlertService({ store, notifier, settings, escalation: opts.escalation, now: clock.now });
  const airConditioners = new AirConditionerService({
    store,
    transmitter,
    alerts,
    notifier,
    settings,
    now: clock.now,
  });
  const sensors = new SensorService({ store, alerts, notifier, settings, now: clock.now });
  const readings = new ReadingService({ store, settings, now: clock.now });
  const ingest = new IngestService({ store, sensors, alerts, airConditioners, notifier, now: clock.now });

  return { clock, settings, store, transport, notifier, transmitter, alerts, airConditioners, sensors, readings, ingest };
}

export type Core = ReturnType<typeof buildCore>;
