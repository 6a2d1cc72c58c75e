import dayjs from 'dayjs';
import type { ThermalSettings } from '../config';
import type { ThermalStore } from '../db/store';
import type { IrTransmitter, TransmitResult } from '../adapters/irTransmitter';
import { RecordingFailedError, errorMessage } from '../errors';
import type { Notifier } from '../realtime/notifier';
import { SYSTEM_ACTOR } from '../types';
import type { Actor, AcStatus, AirConditioner, CommandType, IrSignal, Room } from '../types';
import { logger } from '../utils/logger';
import type { AlertService } from './alertService';
import { hysteresisAction } from './thresholds';
import type { HysteresisAction } from './thresholds';

const log = logger.child({ module: 'actuation' });

export type AirConditionerServiceDeps = {
  store: ThermalStore;
  transmitter: IrTransmitter;
  alerts: AlertService;
  notifier: Notifier;
  settings: ThermalSettings;
  now?: () => Date;
};

export type BulkCommandResult = {
  id: string;
  name: string;
  success: boolean;
};

export type HysteresisResult = {
  action: HysteresisAction;
  changed: boolean;
};

/**
 * Actuation controller. Every power command writes a command log entry
 * whether or not it reached the unit; status only moves on success.
 */
export class AirConditionerService {
  private readonly store: ThermalStore;
  private readonly transmitter: IrTransmitter;
  private readonly alerts: AlertService;
  private readonly notifier: Notifier;
  private readonly settings: ThermalSettings;
  private readonly now: () => Date;

  constructor(deps: AirConditionerServiceDeps) {
    this.store = deps.store;
    this.transmitter = deps.transmitter;
    this.alerts = deps.alerts;
    this.notifier = deps.notifier;
    this.settings = deps.settings;
    this.now = deps.now ?? (() => new Date());
  }

  turnOn(ac: AirConditioner, actor: Actor = SYSTEM_ACTOR): Promise<boolean> {
    return this.execute(ac, 'power_on', 'on', actor);
  }

  turnOff(ac: AirConditioner, actor: Actor = SYSTEM_ACTOR): Promise<boolean> {
    return this.execute(ac, 'power_off', 'off', actor);
  }

  /** A unit that is on is turned off; anything else (off, error) is turned on. */
  async toggle(ac: AirConditioner, actor: Actor): Promise<{ success: boolean; target: AcStatus }> {
    const target: AcStatus = ac.status === 'on' ? 'off' : 'on';
    const success = target === 'on' ? await this.turnOn(ac, actor) : await this.turnOff(ac, actor);
    return { success, target };
  }

  /** Turns off every active unit that is on, optionally within one room. */
  async turnOffAll(actor: Actor, roomId?: string): Promise<BulkCommandResult[]> {
    const units = await this.store.airConditioners.listActiveOn(roomId);
    const results: BulkCommandResult[] = [];
    for (const ac of units) {
      results.push({ id: ac.id, name: ac.name, success: await this.turnOff(ac, actor) });
    }
    return results;
  }

  /** Transmits one IR command. Never throws; failures are returned. */
  async sendCommand(ac: AirConditioner, commandType: CommandType): Promise<TransmitResult> {
    const signal = ac.ir_code[commandType];
    if (!signal) {
      if (this.settings.allowMissingIrCodes) {
        log.warn({ acId: ac.id, commandType }, 'No IR code recorded, assuming delivered');
        return { ok: true, response: `No IR code recorded for ${commandType}; assumed delivered` };
      }
      return { ok: false, response: `No IR code recorded for ${commandType}` };
    }
    if (!ac.transmitter_device_id) {
      return { ok: false, response: 'No IR transmitter assigned' };
    }

    try {
      return await this.transmitter.send(ac.transmitter_device_id, signal, commandType);
    } catch (err) {
      return { ok: false, response: errorMessage(err) };
    }
  }

  async autoTurnOnAc(room: Room): Promise<boolean> {
    const ac = await this.store.airConditioners.findFirstEligible(room.id, 'off');
    if (!ac) {
      log.debug({ roomId: room.id }, 'No idle AC available to turn on');
      return false;
    }
    return this.turnOn(ac, SYSTEM_ACTOR);
  }

  async autoTurnOffAc(room: Room): Promise<boolean> {
    const ac = await this.store.airConditioners.findFirstEligible(room.id, 'on');
    if (!ac) {
      log.debug({ roomId: room.id }, 'No running AC available to turn off');
      return false;
    }
    return this.turnOff(ac, SYSTEM_ACTOR);
  }

  /** One unit per reading, in the direction the dead band calls for. */
  async applyHysteresis(room: Room, temperature: number): Promise<HysteresisResult> {
    const action = hysteresisAction(temperature, room.target_temperature, this.settings.hysteresis);
    if (action === 'turn_on') return { action, changed: await this.autoTurnOnAc(room) };
    if (action === 'turn_off') return { action, changed: await this.autoTurnOffAc(room) };
    return { action, changed: false };
  }

  /** Puts the unit's transmitter into learning mode for one command. */
  async startIrRecording(ac: AirConditioner, commandType: CommandType): Promise<void> {
    if (!ac.transmitter_device_id) {
      throw new RecordingFailedError('No IR transmitter assigned');
    }

    let result: TransmitResult;
    try {
      result = await this.transmitter.enterRecordingMode(ac.transmitter_device_id, commandType);
    } catch (err) {
      result = { ok: false, response: errorMessage(err) };
    }
    if (!result.ok) {
      throw new RecordingFailedError(`Failed to start IR recording: ${result.response}`);
    }
    log.info({ acId: ac.id, commandType }, 'IR recording started');
  }

  /** Prunes command logs older than the retention window. */
  async cleanupOldCommandLogs(): Promise<number> {
    const cutoff = dayjs(this.now()).subtract(this.settings.commandLogRetentionDays, 'day').toDate();
    const deleted = await this.store.commandLogs.deleteOlderThan(cutoff);
    log.info({ deleted, cutoff: cutoff.toISOString() }, 'Old command logs cleaned up');
    return deleted;
  }

  /** Stores a learned frame and makes it the unit's code for that command. */
  async recordIrSignal(
    ac: AirConditioner,
    commandType: CommandType,
    rawSignal: string,
    protocol = ''
  ): Promise<IrSignal> {
    const signal = await this.store.irSignals.upsert({
      air_conditioner_id: ac.id,
      command_type: commandType,
      raw_signal: rawSignal,
      protocol,
    });
    await this.store.airConditioners.setIrCode(ac.id, commandType, rawSignal);
    log.info({ acId: ac.id, commandType }, 'IR signal recorded');
    return signal;
  }

  private async execute(ac: AirConditioner, command: CommandType, target: AcStatus, actor: Actor): Promise<boolean> {
    const result = await this.sendCommand(ac, command);

    await this.store.commandLogs.create({
      air_conditioner_id: ac.id,
      command,
      executed_by: actor.kind === 'user' ? actor.userId : null,
      success: result.ok,
      response: result.response || (result.ok ? 'OK' : 'Failed to send command'),
      automatic: actor.kind === 'system',
    });

    if (!result.ok) {
      log.error({ acId: ac.id, command, response: result.response }, 'AC command failed');
      await this.raiseCommandFailure(ac, command);
      return false;
    }

    const updated = await this.store.airConditioners.updateStatus(ac.id, target, this.now());
    log.info({ acId: ac.id, status: target, automatic: actor.kind === 'system' }, `❄️ AC ${ac.name} turned ${target}`);
    if (updated) this.notifier.acStatusChanged(updated, actor);
    return true;
  }

  private async raiseCommandFailure(ac: AirConditioner, command: CommandType): Promise<void> {
    try {
      await this.alerts.createAlert(ac.room_id, 'ac_error', 'warning', `Failed to execute ${command} on AC ${ac.name}`);
    } catch (err) {
      log.error({ acId: ac.id, err: errorMessage(err) }, 'Could not record AC failure alert');
    }
  }
}
