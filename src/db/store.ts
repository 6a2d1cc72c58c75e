import type {
  AcStatus,
  AggregatedReading,
  AirConditioner,
  Alert,
  AlertCounts,
  AlertType,
  CommandLog,
  CommandType,
  IrSignal,
  LatestSensorReading,
  OperationMode,
  Reading,
  Room,
  Sensor,
  Severity,
  WorkerRun,
} from '../types';

// Persistence boundary. Every mutation that has contending writers is a
// single field-scoped statement in the implementation.

export type RoomSettingsPatch = {
  target_temperature?: number;
  target_humidity?: number;
  operation_mode?: OperationMode;
};

export interface RoomRepository {
  findById(id: string): Promise<Room | null>;
  exists(id: string): Promise<boolean>;
  updateSettings(id: string, patch: RoomSettingsPatch): Promise<Room | null>;
}

export type NewSensor = {
  room_id: string;
  device_id: string;
  name: string;
};

export type MarkOnlineResult = {
  sensor: Sensor;
  wasOnline: boolean;
};

export interface SensorRepository {
  findById(id: string): Promise<Sensor | null>;
  findByDeviceId(deviceId: string): Promise<Sensor | null>;
  /** Throws ConflictError when the device id is already registered. */
  create(input: NewSensor): Promise<Sensor>;
  listByRoom(roomId: string, onlineOnly?: boolean): Promise<Sensor[]>;
  markOnline(id: string, seenAt: Date): Promise<MarkOnlineResult | null>;
  findStaleOnline(cutoff: Date): Promise<Sensor[]>;
  /** Compare-and-set: only flips a sensor that is still online and stale. */
  markOffline(id: string, cutoff: Date): Promise<Sensor | null>;
}

export type NewReading = {
  sensor_id: string;
  temperature: number | null;
  humidity: number | null;
  timestamp: Date;
};

export type ReadingRange = {
  from?: Date;
  to?: Date;
  limit: number;
};

export interface ReadingRepository {
  create(input: NewReading): Promise<Reading>;
  latestForSensor(sensorId: string): Promise<Reading | null>;
  listForSensor(sensorId: string, range: ReadingRange): Promise<Reading[]>;
  latestPerSensor(roomId?: string): Promise<LatestSensorReading[]>;
  deleteOlderThan(cutoff: Date): Promise<number>;
  sensorIdsWithReadingsBefore(cutoff: Date): Promise<string[]>;
  /**
   * Folds raw readings older than the cutoff into hourly buckets and
   * deletes them. Returns the number of buckets written.
   */
  compactHourly(sensorId: string, cutoff: Date): Promise<number>;
  listAggregates(sensorId: string, range: ReadingRange): Promise<AggregatedReading[]>;
}

export interface AirConditionerRepository {
  findById(id: string): Promise<AirConditioner | null>;
  /** First active unit in the room with the given status, by name. */
  findFirstEligible(roomId: string, status: AcStatus): Promise<AirConditioner | null>;
  listActiveOn(roomId?: string): Promise<AirConditioner[]>;
  updateStatus(id: string, status: AcStatus, commandAt: Date): Promise<AirConditioner | null>;
  setIrCode(id: string, commandType: CommandType, rawSignal: string): Promise<AirConditioner | null>;
}

export type NewIrSignal = {
  air_conditioner_id: string;
  command_type: CommandType;
  raw_signal: string;
  protocol: string;
};

export interface IrSignalRepository {
  upsert(input: NewIrSignal): Promise<IrSignal>;
  listForAc(acId: string): Promise<IrSignal[]>;
}

export type NewCommandLog = {
  air_conditioner_id: string;
  command: CommandType;
  executed_by: string | null;
  success: boolean;
  response: string;
  automatic: boolean;
};

export interface CommandLogRepository {
  create(input: NewCommandLog): Promise<CommandLog>;
  listForAc(acId: string, limit: number): Promise<CommandLog[]>;
  deleteOlderThan(cutoff: Date): Promise<number>;
}

export type NewAlert = {
  room_id: string;
  alert_type: AlertType;
  severity: Severity;
  message: string;
};

export type AlertFilter = {
  roomId?: string;
  severity?: Severity;
};

export interface AlertRepository {
  create(input: NewAlert): Promise<Alert>;
  findById(id: string): Promise<Alert | null>;
  findRecentUnacknowledged(roomId: string, type: AlertType, since: Date): Promise<Alert | null>;
  /** Compare-and-set on is_acknowledged = false; null when it lost. */
  acknowledge(id: string, userId: string, at: Date): Promise<Alert | null>;
  acknowledgeAll(userId: string, at: Date, roomId?: string): Promise<number>;
  listUnacknowledged(filter: AlertFilter): Promise<Alert[]>;
  countUnacknowledged(roomId?: string): Promise<AlertCounts>;
  findUnacknowledgedCriticalBefore(cutoff: Date): Promise<Alert[]>;
  deleteAcknowledgedBefore(cutoff: Date): Promise<number>;
}

export type WorkerRunOutcome = {
  success: boolean;
  durationSeconds: number;
  summary?: Record<string, unknown>;
  error?: string;
};

export interface WorkerRunRepository {
  /** Records a run as started and returns its id. */
  start(workerName: string, startedAt: Date): Promise<string>;
  finish(id: string, outcome: WorkerRunOutcome, completedAt: Date): Promise<void>;
  listRecent(limit: number, workerName?: string): Promise<WorkerRun[]>;
}

export interface ThermalStore {
  rooms: RoomRepository;
  sensors: SensorRepository;
  readings: ReadingRepository;
  airConditioners: AirConditionerRepository;
  irSignals: IrSignalRepository;
  commandLogs: CommandLogRepository;
  alerts: AlertRepository;
  workerRuns: WorkerRunRepository;
  /** Database round-trip used by the health check. */
  ping(): Promise<Date>;
}
