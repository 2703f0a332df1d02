import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import nock from 'nock';
import { UpstreamTransportError } from '../gateway/errors';
import { AxiosUpstreamClient } from '../gateway/UpstreamClient';

const TARGET = 'https://upstream.test';

describe('AxiosUpstreamClient', () => {
  beforeAll(() => {
    nock.disableNetConnect();
  });

  afterEach(() => {
    nock.cleanAll();
  });

  afterAll(() => {
    nock.enableNetConnect();
    nock.restore();
  });

  it('should_sendRequest_and_returnStatusHeadersAndBody', async () => {
    const scope = nock(TARGET)
      .post('/v1/chat', 'hello')
      .matchHeader('authorization', 'Bearer k1')
      .reply(201, 'ok', { 'X-Test': '1' });
    const client = new AxiosUpstreamClient(1000);

    const response = await client.send({
      method: 'POST',
      url: `${TARGET}/v1/chat`,
      headers: { Authorization: 'Bearer k1', 'Content-Type': 'text/plain' },
      body: Buffer.from('hello'),
    });

    expect(response.status).toBe(201);
    expect(response.headers['x-test']).toBe('1');
    expect(response.body.toString()).toBe('ok');
    expect(scope.isDone()).toBe(true);
  });

  it('should_resolve_when_upstreamRespondsWithServerError', async () => {
    nock(TARGET).get('/v1/models').reply(500, 'upstream exploded');
    const client = new AxiosUpstreamClient(1000);

    const response = await client.send({ method: 'GET', url: `${TARGET}/v1/models`, headers: {} });

    expect(response.status).toBe(500);
    expect(response.body.toString()).toBe('upstream exploded');
  });

  it('should_keepRepeatedHeadersAsArrays', async () => {
    nock(TARGET).get('/cookies').reply(200, '', { 'Set-Cookie': ['a=1', 'b=2'] });
    const client = new AxiosUpstreamClient(1000);

    const response = await client.send({ method: 'GET', url: `${TARGET}/cookies`, headers: {} });

    expect(response.headers['set-cookie']).toEqual(['a=1', 'b=2']);
  });

  it('should_throwTransportError_when_connectionFails', async () => {
    nock(TARGET).get('/v1/models').replyWithError({ code: 'ECONNREFUSED', message: 'connect ECONNREFUSED' });
    const client = new AxiosUpstreamClient(1000);

    const sending = client.send({ method: 'GET', url: `${TARGET}/v1/models`, headers: {} });

    await expect(sending).rejects.toBeInstanceOf(UpstreamTransportError);
    await expect(sending).rejects.toMatchObject({ reason: 'transport' });
  });

  it('should_throwTimeoutError_when_upstreamTooSlow', async () => {
    nock(TARGET).get('/slow').delay(500).reply(200, 'late');
    const client = new AxiosUpstreamClient(50);

    await expect(client.send({ method: 'GET', url: `${TARGET}/slow`, headers: {} })).rejects.toMatchObject({
      name: 'UpstreamTransportError',
      reason: 'timeout',
    });
  });

  it('should_throwCancelledError_when_signalAborted', async () => {
    const client = new AxiosUpstreamClient(1000);
    const controller = new AbortController();
    controller.abort();

    await expect(
      client.send({ method: 'GET', url: `${TARGET}/v1/models`, headers: {} }, controller.signal)
    ).rejects.toMatchObject({ name: 'UpstreamTransportError', reason: 'cancelled' });
  });
});
