import express from 'express';
import type { Server } from 'http';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { HttpIrTransmitter } from './irTransmitter';

type Received = { path: string; body: unknown };

let server: Server;
let baseUrl = '';
const received: Received[] = [];

beforeAll(async () => {
  const gateway = express();
  gateway.use(express.json());
  gateway.post('/devices/:deviceId/ir/:action', (req, res) => {
    received.push({ path: req.path, body: req.body });
    if (req.params.deviceId === 'IR-BROKEN') {
      res.status(500).json({ error: 'emitter fault' });
      return;
    }
    if (req.params.deviceId === 'IR-SLOW') {
      setTimeout(() => res.json({ ok: true }), 500);
      return;
    }
    res.json({ ok: true });
  });

  server = await new Promise<Server>((resolve) => {
    const s = gateway.listen(0, '127.0.0.1', () => resolve(s));
  });
  const address = server.address();
  if (!address || typeof address === 'string') throw new Error('gateway is not listening on a port');
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve) => server.close(() => resolve()));
});

describe('HttpIrTransmitter', () => {
  it('should post the signal to the device send endpoint', async () => {
    const ir = new HttpIrTransmitter({ baseUrl, timeoutMs: 1000 });

    const result = await ir.send('IR-01', '0xA1B2', 'power_on');

    expect(result).toEqual({ ok: true, response: 'OK' });
    expect(received.at(-1)).toEqual({
      path: '/devices/IR-01/ir/send',
      body: { command_type: 'power_on', signal: '0xA1B2' },
    });
  });

  it('should ask the device to enter recording mode', async () => {
    const ir = new HttpIrTransmitter({ baseUrl, timeoutMs: 1000 });

    const result = await ir.enterRecordingMode('IR-01', 'power_off');

    expect(result.ok).toBe(true);
    expect(received.at(-1)).toEqual({ path: '/devices/IR-01/ir/record', body: { command_type: 'power_off' } });
  });

  it('should report a gateway error status as a failure', async () => {
    const ir = new HttpIrTransmitter({ baseUrl, timeoutMs: 1000 });

    await expect(ir.send('IR-BROKEN', '0xA1B2', 'power_on')).resolves.toEqual({
      ok: false,
      response: 'Transmitter responded 500',
    });
  });

  it('should report a timeout as a failure', async () => {
    const ir = new HttpIrTransmitter({ baseUrl, timeoutMs: 50 });

    await expect(ir.send('IR-SLOW', '0xA1B2', 'power_on')).resolves.toEqual({
      ok: false,
      response: 'Timed out waiting for transmitter',
    });
  });

  it('should fail without contacting anything when no gateway is configured', async () => {
    const ir = new HttpIrTransmitter({ baseUrl: '', timeoutMs: 1000 });
    const before = received.length;

    await expect(ir.send('IR-01', '0xA1B2', 'power_on')).resolves.toEqual({
      ok: false,
      response: 'IR_GATEWAY_URL not configured',
    });
    expect(received).toHaveLength(before);
  });
});
