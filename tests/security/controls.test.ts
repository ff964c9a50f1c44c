import type { FastifyInstance } from 'fastify';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { ConfigSchema } from '../../src/config/schema.js';
import { createServer } from '../../src/server.js';

const OWNER = '0x00000000000000000000000000000000000000f0';
const ALICE = '0x00000000000000000000000000000000000000a1';
const BOB = '0x00000000000000000000000000000000000000b2';

describe('Security Controls', () => {
  let server: FastifyInstance;

  beforeEach(async () => {
    // Config with very tight limits for testing
    const config = ConfigSchema.parse({
      env: 'test',
      server: { port: 3000 },
      logging: { level: 'fatal' }, // quiet
      rateLimit: {
        global: 10,
        windowMs: 1000,
      },
      ledger: { owner: OWNER },
    });

    server = await createServer({ config });
    await server.ready();
  });

  afterEach(async () => {
    if (server) await server.close();
  });

  it('should enforce rate limits', async () => {
    // Exhaust the rate limit (max 10)
    for (let i = 0; i < 10; i++) {
      const res = await server.inject({ method: 'GET', url: '/health' });
      expect(res.statusCode).toBe(200);
    }

    // Request 11: Rate Limited
    const r11 = await server.inject({ method: 'GET', url: '/health' });
    expect(r11.statusCode).toBe(429);
    expect(r11.json()).toMatchObject({
      error: {
        statusCode: 429,
        // message changes based on windowMs
        message: 'Rate limit exceeded, retry in 1 second',
      },
    });
  }, 10000);

  it('should reject write routes without a caller', async () => {
    const response = await server.inject({
      method: 'PUT',
      url: '/approvals',
      payload: { operator: BOB, approved: true },
    });

    expect(response.statusCode).toBe(401);
    expect(response.json().error).toEqual({
      code: 'CALLER_MISSING',
      message: 'Missing x-caller header',
      statusCode: 401,
    });
  });

  it('should reject a caller header that is not an address', async () => {
    const response = await server.inject({
      method: 'PUT',
      url: '/approvals',
      headers: { 'x-caller': 'alice' },
      payload: { operator: BOB, approved: true },
    });

    expect(response.statusCode).toBe(401);
    expect(response.json().error.code).toBe('CALLER_INVALID');
    expect(response.json().error.message).toBe('Invalid x-caller header: alice');
  });

  it('should reject the zero address as caller', async () => {
    const zero = '0x0000000000000000000000000000000000000000';
    const response = await server.inject({
      method: 'PUT',
      url: '/approvals',
      headers: { 'x-caller': zero },
      payload: { operator: BOB, approved: true },
    });

    expect(response.statusCode).toBe(401);
    expect(response.json().error.code).toBe('CALLER_INVALID');
    expect(response.json().error.message).toBe(`Invalid x-caller header: ${zero}`);
  });

  it('should keep mint and burn to the ledger owner', async () => {
    const mint = await server.inject({
      method: 'POST',
      url: '/mint',
      headers: { 'x-caller': ALICE },
      payload: { to: ALICE, id: '1', amount: '1000' },
    });
    const burn = await server.inject({
      method: 'POST',
      url: '/burn',
      headers: { 'x-caller': ALICE },
      payload: { owner: ALICE, id: '1', amount: '1' },
    });

    expect(mint.statusCode).toBe(403);
    expect(mint.json().error.message).toBe('Unauthorized');
    expect(burn.statusCode).toBe(403);
  });

  it('should not let one holder move another holder\'s balance', async () => {
    await server.inject({
      method: 'POST',
      url: '/mint',
      headers: { 'x-caller': OWNER },
      payload: { to: ALICE, id: '1', amount: '10' },
    });

    const response = await server.inject({
      method: 'POST',
      url: '/transfers',
      headers: { 'x-caller': BOB },
      payload: { from: ALICE, to: BOB, id: '1', amount: '10' },
    });

    expect(response.statusCode).toBe(403);
    expect(response.json().error.code).toBe('LEDGER_UNAUTHORIZED');
  });

  it('should enforce body size limits', async () => {
    const largePayload = 'a'.repeat(262145); // 256KB + 1 byte

    const response = await server.inject({
      method: 'POST',
      url: '/transfers', // Any POST route
      headers: { 'x-caller': ALICE },
      payload: { data: largePayload },
    });

    expect(response.statusCode).toBe(413); // Payload Too Large
    expect(response.json()).toMatchObject({
      error: {
        statusCode: 413,
        code: 'FST_ERR_CTP_BODY_TOO_LARGE',
      },
    });
  });

  it('should set security headers', async () => {
    const response = await server.inject({ method: 'GET', url: '/health' });

    expect(response.headers['x-content-type-options']).toBe('nosniff');
  });
});
