// src/db/ensureSchema.ts
import { Pool } from 'pg';
import { logger } from '../utils/logger';

const log = logger.child({ module: 'db' });

export async function ensureSchema(pool: Pool) {
  log.info('Ensuring database schema...');

  await pool.query(`
    CREATE TABLE IF NOT EXISTS data_centers (
      id UUID PRIMARY KEY,
      name TEXT NOT NULL,
      location TEXT NOT NULL DEFAULT '',
      is_active BOOLEAN NOT NULL DEFAULT TRUE,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );

    CREATE TABLE IF NOT EXISTS rooms (
      id UUID PRIMARY KEY,
      data_center_id UUID REFERENCES data_centers(id) ON DELETE CASCADE,
      name TEXT NOT NULL,
      target_temperature DOUBLE PRECISION NOT NULL DEFAULT 22.0
        CHECK (target_temperature BETWEEN 15 AND 30),
      target_humidity DOUBLE PRECISION NOT NULL DEFAULT 50.0
        CHECK (target_humidity BETWEEN 20 AND 80),
      operation_mode TEXT NOT NULL DEFAULT 'manual'
        CHECK (operation_mode IN ('manual', 'automatic')),
      is_active BOOLEAN NOT NULL DEFAULT TRUE,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      UNIQUE (data_center_id, name)
    );

    CREATE TABLE IF NOT EXISTS sensors (
      id UUID PRIMARY KEY,
      room_id UUID NOT NULL REFERENCES rooms(id) ON DELETE CASCADE,
      device_id TEXT UNIQUE NOT NULL,
      name TEXT NOT NULL DEFAULT '',
      is_online BOOLEAN NOT NULL DEFAULT FALSE,
      last_seen TIMESTAMPTZ,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );

    CREATE TABLE IF NOT EXISTS sensor_readings (
      id UUID PRIMARY KEY,
      sensor_id UUID NOT NULL REFERENCES sensors(id) ON DELETE CASCADE,
      temperature DOUBLE PRECISION CHECK (temperature BETWEEN -40 AND 80),
      humidity DOUBLE PRECISION CHECK (humidity BETWEEN 0 AND 100),
      timestamp TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      CHECK (temperature IS NOT NULL OR humidity IS NOT NULL)
    );

    CREATE INDEX IF NOT EXISTS idx_sensor_readings_sensor_ts
      ON sensor_readings (sensor_id, timestamp DESC);

    CREATE TABLE IF NOT EXISTS aggregated_readings (
      id UUID PRIMARY KEY,
      sensor_id UUID NOT NULL REFERENCES sensors(id) ON DELETE CASCADE,
      hour TIMESTAMPTZ NOT NULL,
      temp_min DOUBLE PRECISION,
      temp_max DOUBLE PRECISION,
      temp_avg DOUBLE PRECISION,
      humidity_min DOUBLE PRECISION,
      humidity_max DOUBLE PRECISION,
      humidity_avg DOUBLE PRECISION,
      reading_count INT NOT NULL DEFAULT 0,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      UNIQUE (sensor_id, hour)
    );

    CREATE TABLE IF NOT EXISTS air_conditioners (
      id UUID PRIMARY KEY,
      room_id UUID NOT NULL REFERENCES rooms(id) ON DELETE CASCADE,
      name TEXT NOT NULL,
      status TEXT NOT NULL DEFAULT 'off' CHECK (status IN ('on', 'off', 'error')),
      is_active BOOLEAN NOT NULL DEFAULT TRUE,
      ir_code JSONB NOT NULL DEFAULT '{}'::jsonb,
      transmitter_device_id TEXT NOT NULL DEFAULT '',
      last_command TIMESTAMPTZ,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );

    CREATE TABLE IF NOT EXISTS ir_signals (
      id UUID PRIMARY KEY,
      air_conditioner_id UUID NOT NULL REFERENCES air_conditioners(id) ON DELETE CASCADE,
      command_type TEXT NOT NULL,
      raw_signal TEXT NOT NULL,
      protocol TEXT NOT NULL DEFAULT '',
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      UNIQUE (air_conditioner_id, command_type)
    );

    CREATE TABLE IF NOT EXISTS command_logs (
      id UUID PRIMARY KEY,
      air_conditioner_id UUID NOT NULL REFERENCES air_conditioners(id) ON DELETE CASCADE,
      command TEXT NOT NULL,
      executed_by TEXT,
      success BOOLEAN NOT NULL,
      response TEXT NOT NULL DEFAULT '',
      automatic BOOLEAN NOT NULL DEFAULT FALSE,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );

    CREATE INDEX IF NOT EXISTS idx_command_logs_ac_created
      ON command_logs (air_conditioner_id, created_at DESC);

    CREATE TABLE IF NOT EXISTS alerts (
      id UUID PRIMARY KEY,
      room_id UUID NOT NULL REFERENCES rooms(id) ON DELETE CASCADE,
      alert_type TEXT NOT NULL,
      severity TEXT NOT NULL CHECK (severity IN ('info', 'warning', 'critical')),
      message TEXT NOT NULL,
      is_acknowledged BOOLEAN NOT NULL DEFAULT FALSE,
      acknowledged_by TEXT,
      acknowledged_at TIMESTAMPTZ,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );

    CREATE INDEX IF NOT EXISTS idx_alerts_open_room_type
      ON alerts (room_id, alert_type, created_at DESC)
      WHERE is_acknowledged = FALSE;

    CREATE TABLE IF NOT EXISTS worker_runs (
      id UUID PRIMARY KEY,
      worker_name TEXT NOT NULL,
      status TEXT NOT NULL DEFAULT 'running',
      success BOOLEAN,
      started_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      completed_at TIMESTAMPTZ,
      duration_seconds NUMERIC,
      summary JSONB,
      error_message TEXT
    );
  `);

  log.info('✅ Database schema ensured');
}
