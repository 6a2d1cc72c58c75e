// Domain rows as they are stored and returned by the persistence layer.

export const OPERATION_MODES = ['manual', 'automatic'] as const;
export type OperationMode = (typeof OPERATION_MODES)[number];

export const AC_STATUSES = ['on', 'off', 'error'] as const;
export type AcStatus = (typeof AC_STATUSES)[number];

export const ALERT_TYPES = [
  'high_temp',
  'low_temp',
  'high_humidity',
  'low_humidity',
  'sensor_offline',
  'ac_error',
  'system_error',
] as const;
export type AlertType = (typeof ALERT_TYPES)[number];

export const SEVERITIES = ['info', 'warning', 'critical'] as const;
export type Severity = (typeof SEVERITIES)[number];

export const COMMAND_TYPES = [
  'power_on',
  'power_off',
  'temp_up',
  'temp_down',
  'mode_cool',
  'mode_heat',
  'mode_auto',
  'fan_low',
  'fan_med',
  'fan_high',
] as const;
export type CommandType = (typeof COMMAND_TYPES)[number];

export const USER_ROLES = ['admin', 'operator', 'viewer'] as const;
export type UserRole = (typeof USER_ROLES)[number];

export type Room = {
  id: string;
  data_center_id: string | null;
  name: string;
  target_temperature: number;
  target_humidity: number;
  operation_mode: OperationMode;
  is_active: boolean;
  created_at: Date;
  updated_at: Date;
};

export type Sensor = {
  id: string;
  room_id: string;
  device_id: string;
  name: string;
  is_online: boolean;
  last_seen: Date | null;
  created_at: Date;
  updated_at: Date;
};

export type Reading = {
  id: string;
  sensor_id: string;
  temperature: number | null;
  humidity: number | null;
  timestamp: Date;
  created_at: Date;
};

export type AggregatedReading = {
  id: string;
  sensor_id: string;
  hour: Date;
  temp_min: number | null;
  temp_max: number | null;
  temp_avg: number | null;
  humidity_min: number | null;
  humidity_max: number | null;
  humidity_avg: number | null;
  reading_count: number;
};

/** Opaque IR frames keyed by command name. */
export type IrCodeMap = Partial<Record<CommandType, string>>;

export type AirConditioner = {
  id: string;
  room_id: string;
  name: string;
  status: AcStatus;
  is_active: boolean;
  ir_code: IrCodeMap;
  transmitter_device_id: string;
  last_command: Date | null;
  created_at: Date;
  updated_at: Date;
};

export type IrSignal = {
  id: string;
  air_conditioner_id: string;
  command_type: CommandType;
  raw_signal: string;
  protocol: string;
  created_at: Date;
  updated_at: Date;
};

export type CommandLog = {
  id: string;
  air_conditioner_id: string;
  command: CommandType;
  executed_by: string | null;
  success: boolean;
  response: string;
  automatic: boolean;
  created_at: Date;
};

export type Alert = {
  id: string;
  room_id: string;
  alert_type: AlertType;
  severity: Severity;
  message: string;
  is_acknowledged: boolean;
  acknowledged_by: string | null;
  acknowledged_at: Date | null;
  created_at: Date;
  updated_at: Date;
};

export type WorkerRunStatus = 'running' | 'success' | 'failed';

export type WorkerRun = {
  id: string;
  worker_name: string;
  status: WorkerRunStatus;
  success: boolean | null;
  started_at: Date;
  completed_at: Date | null;
  duration_seconds: number | null;
  summary: Record<string, unknown> | null;
  error_message: string | null;
};

/**
 * Who issued an actuation. Automatic control runs as the system; a manual
 * command carries the authenticated user.
 */
export type Actor =
  | { kind: 'system' }
  | { kind: 'user'; userId: string; role: UserRole };

export const SYSTEM_ACTOR: Actor = { kind: 'system' };

export function actorLabel(actor: Actor): string {
  return actor.kind === 'system' ? 'system' : actor.userId;
}

export type AlertCounts = {
  total: number;
  critical: number;
  warning: number;
  info: number;
};

export type RoomAverages = {
  temperature: number | null;
  humidity: number | null;
};

export type LatestSensorReading = {
  sensor_id: string;
  sensor_name: string;
  device_id: string;
  room_id: string;
  is_online: boolean;
  temperature: number | null;
  humidity: number | null;
  timestamp: Date;
};
