// src/db/pgStore.ts
import { Pool, PoolClient } from 'pg';
import { v4 as uuidv4 } from 'uuid';
import { ConflictError } from '../errors';
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
  Reading,
  Room,
  Sensor,
  WorkerRun,
} from '../types';
import type {
  AirConditionerRepository,
  AlertFilter,
  AlertRepository,
  CommandLogRepository,
  IrSignalRepository,
  MarkOnlineResult,
  NewAlert,
  NewCommandLog,
  NewIrSignal,
  NewReading,
  NewSensor,
  ReadingRange,
  ReadingRepository,
  RoomRepository,
  RoomSettingsPatch,
  SensorRepository,
  ThermalStore,
  WorkerRunOutcome,
  WorkerRunRepository,
} from './store';

const UNIQUE_VIOLATION = '23505';

export function isUniqueViolation(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === UNIQUE_VIOLATION;
}

async function inTransaction<T>(pool: Pool, fn: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  } finally {
    client.release();
  }
}

/* -------------------------------------------------------------------------- */
/*                                    Rooms                                   */
/* -------------------------------------------------------------------------- */

class PgRoomRepository implements RoomRepository {
  constructor(private readonly pool: Pool) {}

  async findById(id: string): Promise<Room | null> {
    const { rows } = await this.pool.query<Room>('SELECT * FROM rooms WHERE id = $1', [id]);
    return rows[0] ?? null;
  }

  async exists(id: string): Promise<boolean> {
    const { rowCount } = await this.pool.query('SELECT 1 FROM rooms WHERE id = $1', [id]);
    return (rowCount ?? 0) > 0;
  }

  async updateSettings(id: string, patch: RoomSettingsPatch): Promise<Room | null> {
    // Build dynamic UPDATE query for only provided fields
    const updates: string[] = [];
    const values: Array<string | number> = [];
    let paramIndex = 1;

    if (patch.target_temperature !== undefined) {
      updates.push(`target_temperature = $${paramIndex++}`);
      values.push(patch.target_temperature);
    }
    if (patch.target_humidity !== undefined) {
      updates.push(`target_humidity = $${paramIndex++}`);
      values.push(patch.target_humidity);
    }
    if (patch.operation_mode !== undefined) {
      updates.push(`operation_mode = $${paramIndex++}`);
      values.push(patch.operation_mode);
    }

    updates.push('updated_at = NOW()');
    values.push(id);

    const { rows } = await this.pool.query<Room>(
      `UPDATE rooms SET ${updates.join(', ')} WHERE id = $${paramIndex} RETURNING *`,
      values
    );
    return rows[0] ?? null;
  }
}

/* -------------------------------------------------------------------------- */
/*                                   Sensors                                  */
/* -------------------------------------------------------------------------- */

class PgSensorRepository implements SensorRepository {
  constructor(private readonly pool: Pool) {}

  async findById(id: string): Promise<Sensor | null> {
    const { rows } = await this.pool.query<Sensor>('SELECT * FROM sensors WHERE id = $1', [id]);
    return rows[0] ?? null;
  }

  async findByDeviceId(deviceId: string): Promise<Sensor | null> {
    const { rows } = await this.pool.query<Sensor>('SELECT * FROM sensors WHERE device_id = $1', [deviceId]);
    return rows[0] ?? null;
  }

  async create(input: NewSensor): Promise<Sensor> {
    try {
      const { rows } = await this.pool.query<Sensor>(
        `INSERT INTO sensors (id, room_id, device_id, name, is_online, last_seen, created_at, updated_at)
         VALUES ($1, $2, $3, $4, FALSE, NULL, NOW(), NOW())
         RETURNING *`,
        [uuidv4(), input.room_id, input.device_id, input.name]
      );
      return rows[0];
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw new ConflictError(`Sensor with device id ${input.device_id} already exists`, 'duplicate_device_id');
      }
      throw err;
    }
  }

  async listByRoom(roomId: string, onlineOnly = false): Promise<Sensor[]> {
    const { rows } = await this.pool.query<Sensor>(
      `SELECT * FROM sensors
       WHERE room_id = $1 AND ($2::boolean = FALSE OR is_online = TRUE)
       ORDER BY name`,
      [roomId, onlineOnly]
    );
    return rows;
  }

  async markOnline(id: string, seenAt: Date): Promise<MarkOnlineResult | null> {
    const { rows } = await this.pool.query<Sensor & { was_online: boolean }>(
      `UPDATE sensors s
       SET is_online = TRUE,
           last_seen = $2,
           updated_at = NOW()
       FROM (SELECT id, is_online AS was_online FROM sensors WHERE id = $1 FOR UPDATE) prev
       WHERE s.id = prev.id
       RETURNING s.*, prev.was_online`,
      [id, seenAt]
    );
    const row = rows[0];
    if (!row) return null;
    const { was_online, ...sensor } = row;
    return { sensor, wasOnline: was_online };
  }

  async findStaleOnline(cutoff: Date): Promise<Sensor[]> {
    const { rows } = await this.pool.query<Sensor>(
      `SELECT * FROM sensors
       WHERE is_online = TRUE AND last_seen < $1
       ORDER BY last_seen`,
      [cutoff]
    );
    return rows;
  }

  async markOffline(id: string, cutoff: Date): Promise<Sensor | null> {
    const { rows } = await this.pool.query<Sensor>(
      `UPDATE sensors
       SET is_online = FALSE,
           updated_at = NOW()
       WHERE id = $1
         AND is_online = TRUE
         AND last_seen < $2
       RETURNING *`,
      [id, cutoff]
    );
    return rows[0] ?? null;
  }
}

/* -------------------------------------------------------------------------- */
/*                                  Readings                                  */
/* -------------------------------------------------------------------------- */

class PgReadingRepository implements ReadingRepository {
  constructor(private readonly pool: Pool) {}

  async create(input: NewReading): Promise<Reading> {
    const { rows } = await this.pool.query<Reading>(
      `INSERT INTO sensor_readings (id, sensor_id, temperature, humidity, timestamp, created_at)
       VALUES ($1, $2, $3, $4, $5, NOW())
       RETURNING *`,
      [uuidv4(), input.sensor_id, input.temperature, input.humidity, input.timestamp]
    );
    return rows[0];
  }

  async latestForSensor(sensorId: string): Promise<Reading | null> {
    const { rows } = await this.pool.query<Reading>(
      `SELECT * FROM sensor_readings
       WHERE sensor_id = $1
       ORDER BY timestamp DESC
       LIMIT 1`,
      [sensorId]
    );
    return rows[0] ?? null;
  }

  async listForSensor(sensorId: string, range: ReadingRange): Promise<Reading[]> {
    const { rows } = await this.pool.query<Reading>(
      `SELECT * FROM sensor_readings
       WHERE sensor_id = $1
         AND ($2::timestamptz IS NULL OR timestamp >= $2)
         AND ($3::timestamptz IS NULL OR timestamp <= $3)
       ORDER BY timestamp DESC
       LIMIT $4`,
      [sensorId, range.from ?? null, range.to ?? null, range.limit]
    );
    return rows;
  }

  async latestPerSensor(roomId?: string): Promise<LatestSensorReading[]> {
    const { rows } = await this.pool.query<LatestSensorReading>(
      `SELECT DISTINCT ON (s.id)
         s.id AS sensor_id,
         s.name AS sensor_name,
         s.device_id,
         s.room_id,
         s.is_online,
         r.temperature,
         r.humidity,
         r.timestamp
       FROM sensors s
       JOIN sensor_readings r ON r.sensor_id = s.id
       WHERE ($1::uuid IS NULL OR s.room_id = $1)
       ORDER BY s.id, r.timestamp DESC`,
      [roomId ?? null]
    );
    return rows;
  }

  async deleteOlderThan(cutoff: Date): Promise<number> {
    const result = await this.pool.query('DELETE FROM sensor_readings WHERE timestamp < $1', [cutoff]);
    return result.rowCount ?? 0;
  }

  async sensorIdsWithReadingsBefore(cutoff: Date): Promise<string[]> {
    const { rows } = await this.pool.query<{ sensor_id: string }>(
      'SELECT DISTINCT sensor_id FROM sensor_readings WHERE timestamp < $1',
      [cutoff]
    );
    return rows.map((r) => r.sensor_id);
  }

  async compactHourly(sensorId: string, cutoff: Date): Promise<number> {
    return inTransaction(this.pool, async (client) => {
      // Buckets already on disk (late or backfilled readings) are merged,
      // weighting averages by reading count.
      const upsert = await client.query(
        `WITH hourly AS (
           SELECT
             date_trunc('hour', timestamp) AS hour,
             MIN(temperature) AS temp_min,
             MAX(temperature) AS temp_max,
             AVG(temperature) AS temp_avg,
             MIN(humidity) AS humidity_min,
             MAX(humidity) AS humidity_max,
             AVG(humidity) AS humidity_avg,
             COUNT(*)::int AS reading_count
           FROM sensor_readings
           WHERE sensor_id = $1 AND timestamp < $2
           GROUP BY 1
         )
         INSERT INTO aggregated_readings (
           id, sensor_id, hour,
           temp_min, temp_max, temp_avg,
           humidity_min, humidity_max, humidity_avg,
           reading_count, created_at, updated_at
         )
         SELECT
           gen_random_uuid(), $1, h.hour,
           h.temp_min, h.temp_max, h.temp_avg,
           h.humidity_min, h.humidity_max, h.humidity_avg,
           h.reading_count, NOW(), NOW()
         FROM hourly h
         ON CONFLICT (sensor_id, hour) DO UPDATE SET
           temp_min = LEAST(aggregated_readings.temp_min, EXCLUDED.temp_min),
           temp_max = GREATEST(aggregated_readings.temp_max, EXCLUDED.temp_max),
           temp_avg = CASE
             WHEN aggregated_readings.temp_avg IS NULL THEN EXCLUDED.temp_avg
             WHEN EXCLUDED.temp_avg IS NULL THEN aggregated_readings.temp_avg
             ELSE (aggregated_readings.temp_avg * aggregated_readings.reading_count
                   + EXCLUDED.temp_avg * EXCLUDED.reading_count)
                  / (aggregated_readings.reading_count + EXCLUDED.reading_count)
           END,
           humidity_min = LEAST(aggregated_readings.humidity_min, EXCLUDED.humidity_min),
           humidity_max = GREATEST(aggregated_readings.humidity_max, EXCLUDED.humidity_max),
           humidity_avg = CASE
             WHEN aggregated_readings.humidity_avg IS NULL THEN EXCLUDED.humidity_avg
             WHEN EXCLUDED.humidity_avg IS NULL THEN aggregated_readings.humidity_avg
             ELSE (aggregated_readings.humidity_avg * aggregated_readings.reading_count
                   + EXCLUDED.humidity_avg * EXCLUDED.reading_count)
                  / (aggregated_readings.reading_count + EXCLUDED.reading_count)
           END,
           reading_count = aggregated_readings.reading_count + EXCLUDED.reading_count,
           updated_at = NOW()`,
        [sensorId, cutoff]
      );

      await client.query('DELETE FROM sensor_readings WHERE sensor_id = $1 AND timestamp < $2', [sensorId, cutoff]);

      return upsert.rowCount ?? 0;
    });
  }

  async listAggregates(sensorId: string, range: ReadingRange): Promise<AggregatedReading[]> {
    const { rows } = await this.pool.query<AggregatedReading>(
      `SELECT id, sensor_id, hour, temp_min, temp_max, temp_avg,
              humidity_min, humidity_max, humidity_avg, reading_count
       FROM aggregated_readings
       WHERE sensor_id = $1
         AND ($2::timestamptz IS NULL OR hour >= $2)
         AND ($3::timestamptz IS NULL OR hour <= $3)
       ORDER BY hour DESC
       LIMIT $4`,
      [sensorId, range.from ?? null, range.to ?? null, range.limit]
    );
    return rows;
  }
}

/* -------------------------------------------------------------------------- */
/*                              Air conditioners                              */
/* -------------------------------------------------------------------------- */

class PgAirConditionerRepository implements AirConditionerRepository {
  constructor(private readonly pool: Pool) {}

  async findById(id: string): Promise<AirConditioner | null> {
    const { rows } = await this.pool.query<AirConditioner>('SELECT * FROM air_conditioners WHERE id = $1', [id]);
    return rows[0] ?? null;
  }

  async findFirstEligible(roomId: string, status: AcStatus): Promise<AirConditioner | null> {
    const { rows } = await this.pool.query<AirConditioner>(
      `SELECT * FROM air_conditioners
       WHERE room_id = $1 AND is_active = TRUE AND status = $2
       ORDER BY name, id
       LIMIT 1`,
      [roomId, status]
    );
    return rows[0] ?? null;
  }

  async listActiveOn(roomId?: string): Promise<AirConditioner[]> {
    const { rows } = await this.pool.query<AirConditioner>(
      `SELECT * FROM air_conditioners
       WHERE is_active = TRUE AND status = 'on'
         AND ($1::uuid IS NULL OR room_id = $1)
       ORDER BY name, id`,
      [roomId ?? null]
    );
    return rows;
  }

  async updateStatus(id: string, status: AcStatus, commandAt: Date): Promise<AirConditioner | null> {
    const { rows } = await this.pool.query<AirConditioner>(
      `UPDATE air_conditioners
       SET status = $2,
           last_command = $3,
           updated_at = NOW()
       WHERE id = $1
       RETURNING *`,
      [id, status, commandAt]
    );
    return rows[0] ?? null;
  }

  async setIrCode(id: string, commandType: CommandType, rawSignal: string): Promise<AirConditioner | null> {
    const { rows } = await this.pool.query<AirConditioner>(
      `UPDATE air_conditioners
       SET ir_code = COALESCE(ir_code, '{}'::jsonb) || jsonb_build_object($2::text, $3::text),
           updated_at = NOW()
       WHERE id = $1
       RETURNING *`,
      [id, commandType, rawSignal]
    );
    return rows[0] ?? null;
  }
}

class PgIrSignalRepository implements IrSignalRepository {
  constructor(private readonly pool: Pool) {}

  async upsert(input: NewIrSignal): Promise<IrSignal> {
    const { rows } = await this.pool.query<IrSignal>(
      `INSERT INTO ir_signals (id, air_conditioner_id, command_type, raw_signal, protocol, created_at, updated_at)
       VALUES ($1, $2, $3, $4, $5, NOW(), NOW())
       ON CONFLICT (air_conditioner_id, command_type)
       DO UPDATE SET
         raw_signal = EXCLUDED.raw_signal,
         protocol = EXCLUDED.protocol,
         updated_at = NOW()
       RETURNING *`,
      [uuidv4(), input.air_conditioner_id, input.command_type, input.raw_signal, input.protocol]
    );
    return rows[0];
  }

  async listForAc(acId: string): Promise<IrSignal[]> {
    const { rows } = await this.pool.query<IrSignal>(
      'SELECT * FROM ir_signals WHERE air_conditioner_id = $1 ORDER BY command_type',
      [acId]
    );
    return rows;
  }
}

class PgCommandLogRepository implements CommandLogRepository {
  constructor(private readonly pool: Pool) {}

  async create(input: NewCommandLog): Promise<CommandLog> {
    const { rows } = await this.pool.query<CommandLog>(
      `INSERT INTO command_logs (id, air_conditioner_id, command, executed_by, success, response, automatic, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, NOW())
       RETURNING *`,
      [
        uuidv4(),
        input.air_conditioner_id,
        input.command,
        input.executed_by,
        input.success,
        input.response,
        input.automatic,
      ]
    );
    return rows[0];
  }

  async listForAc(acId: string, limit: number): Promise<CommandLog[]> {
    const { rows } = await this.pool.query<CommandLog>(
      `SELECT * FROM command_logs
       WHERE air_conditioner_id = $1
       ORDER BY created_at DESC
       LIMIT $2`,
      [acId, limit]
    );
    return rows;
  }

  async deleteOlderThan(cutoff: Date): Promise<number> {
    const result = await this.pool.query('DELETE FROM command_logs WHERE created_at < $1', [cutoff]);
    return result.rowCount ?? 0;
  }
}

/* -------------------------------------------------------------------------- */
/*                                   Alerts                                   */
/* -------------------------------------------------------------------------- */

class PgAlertRepository implements AlertRepository {
  constructor(private readonly pool: Pool) {}

  async create(input: NewAlert): Promise<Alert> {
    const { rows } = await this.pool.query<Alert>(
      `INSERT INTO alerts (id, room_id, alert_type, severity, message, is_acknowledged, created_at, updated_at)
       VALUES ($1, $2, $3, $4, $5, FALSE, NOW(), NOW())
       RETURNING *`,
      [uuidv4(), input.room_id, input.alert_type, input.severity, input.message]
    );
    return rows[0];
  }

  async findById(id: string): Promise<Alert | null> {
    const { rows } = await this.pool.query<Alert>('SELECT * FROM alerts WHERE id = $1', [id]);
    return rows[0] ?? null;
  }

  async findRecentUnacknowledged(roomId: string, type: AlertType, since: Date): Promise<Alert | null> {
    const { rows } = await this.pool.query<Alert>(
      `SELECT * FROM alerts
       WHERE room_id = $1
         AND alert_type = $2
         AND created_at >= $3
         AND is_acknowledged = FALSE
       ORDER BY created_at DESC
       LIMIT 1`,
      [roomId, type, since]
    );
    return rows[0] ?? null;
  }

  async acknowledge(id: string, userId: string, at: Date): Promise<Alert | null> {
    const { rows } = await this.pool.query<Alert>(
      `UPDATE alerts
       SET is_acknowledged = TRUE,
           acknowledged_by = $2,
           acknowledged_at = $3,
           updated_at = NOW()
       WHERE id = $1 AND is_acknowledged = FALSE
       RETURNING *`,
      [id, userId, at]
    );
    return rows[0] ?? null;
  }

  async acknowledgeAll(userId: string, at: Date, roomId?: string): Promise<number> {
    const result = await this.pool.query(
      `UPDATE alerts
       SET is_acknowledged = TRUE,
           acknowledged_by = $1,
           acknowledged_at = $2,
           updated_at = NOW()
       WHERE is_acknowledged = FALSE
         AND ($3::uuid IS NULL OR room_id = $3)`,
      [userId, at, roomId ?? null]
    );
    return result.rowCount ?? 0;
  }

  async listUnacknowledged(filter: AlertFilter): Promise<Alert[]> {
    const { rows } = await this.pool.query<Alert>(
      `SELECT * FROM alerts
       WHERE is_acknowledged = FALSE
         AND ($1::uuid IS NULL OR room_id = $1)
         AND ($2::text IS NULL OR severity = $2)
       ORDER BY created_at DESC`,
      [filter.roomId ?? null, filter.severity ?? null]
    );
    return rows;
  }

  async countUnacknowledged(roomId?: string): Promise<AlertCounts> {
    const { rows } = await this.pool.query<AlertCounts>(
      `SELECT
         COUNT(*)::int AS total,
         COUNT(*) FILTER (WHERE severity = 'critical')::int AS critical,
         COUNT(*) FILTER (WHERE severity = 'warning')::int AS warning,
         COUNT(*) FILTER (WHERE severity = 'info')::int AS info
       FROM alerts
       WHERE is_acknowledged = FALSE
         AND ($1::uuid IS NULL OR room_id = $1)`,
      [roomId ?? null]
    );
    return rows[0] ?? { total: 0, critical: 0, warning: 0, info: 0 };
  }

  async findUnacknowledgedCriticalBefore(cutoff: Date): Promise<Alert[]> {
    const { rows } = await this.pool.query<Alert>(
      `SELECT * FROM alerts
       WHERE severity = 'critical'
         AND is_acknowledged = FALSE
         AND created_at <= $1
       ORDER BY created_at`,
      [cutoff]
    );
    return rows;
  }

  async deleteAcknowledgedBefore(cutoff: Date): Promise<number> {
    const result = await this.pool.query(
      'DELETE FROM alerts WHERE is_acknowledged = TRUE AND created_at < $1',
      [cutoff]
    );
    return result.rowCount ?? 0;
  }
}

/* -------------------------------------------------------------------------- */
/*                                 Worker runs                                */
/* -------------------------------------------------------------------------- */

class PgWorkerRunRepository implements WorkerRunRepository {
  constructor(private readonly pool: Pool) {}

  async start(workerName: string, startedAt: Date): Promise<string> {
    const id = uuidv4();
    await this.pool.query(
      `INSERT INTO worker_runs (id, worker_name, started_at, status)
       VALUES ($1, $2, $3, 'running')`,
      [id, workerName, startedAt]
    );
    return id;
  }

  async finish(id: string, outcome: WorkerRunOutcome, completedAt: Date): Promise<void> {
    await this.pool.query(
      `UPDATE worker_runs
       SET completed_at = $2,
           status = $3,
           success = $4,
           duration_seconds = $5,
           summary = $6,
           error_message = $7
       WHERE id = $1`,
      [
        id,
        completedAt,
        outcome.success ? 'success' : 'failed',
        outcome.success,
        outcome.durationSeconds,
        outcome.summary ? JSON.stringify(outcome.summary) : null,
        outcome.error ?? null,
      ]
    );
  }

  async listRecent(limit: number, workerName?: string): Promise<WorkerRun[]> {
    const { rows } = await this.pool.query<WorkerRun>(
      `SELECT id, worker_name, status, success, started_at, completed_at,
              duration_seconds::float8 AS duration_seconds, summary, error_message
       FROM worker_runs
       WHERE ($2::text IS NULL OR worker_name = $2)
       ORDER BY started_at DESC
       LIMIT $1`,
      [limit, workerName ?? null]
    );
    return rows;
  }
}

export class PgThermalStore implements ThermalStore {
  readonly rooms: RoomRepository;
  readonly sensors: SensorRepository;
  readonly readings: ReadingRepository;
  readonly airConditioners: AirConditionerRepository;
  readonly irSignals: IrSignalRepository;
  readonly commandLogs: CommandLogRepository;
  readonly alerts: AlertRepository;
  readonly workerRuns: WorkerRunRepository;

  constructor(private readonly pool: Pool) {
    this.rooms = new PgRoomRepository(pool);
    this.sensors = new PgSensorRepository(pool);
    this.readings = new PgReadingRepository(pool);
    this.airConditioners = new PgAirConditionerRepository(pool);
    this.irSignals = new PgIrSignalRepository(pool);
    this.commandLogs = new PgCommandLogRepository(pool);
    this.alerts = new PgAlertRepository(pool);
    this.workerRuns = new PgWorkerRunRepository(pool);
  }

  async ping(): Promise<Date> {
    const { rows } = await this.pool.query<{ db_time: Date }>('SELECT NOW() AS db_time');
    return rows[0].db_time;
  }
}
