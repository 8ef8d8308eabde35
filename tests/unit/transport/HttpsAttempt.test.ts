import { describe, it, expect, beforeAll, afterEach } from '@jest/globals';
import {
  READ_TIMEOUT_CODE,
  TransportAttemptError,
  TransportRequest,
  httpsAttempt,
} from '../../../src/transport/HttpsAttempt.js';
import { TestPki, createTestPki, issueCertificate } from '../../helpers/pki.js';
import { SoapTestServer, findClosedPort, respondXml, startSoapServer } from '../../helpers/soapServer.js';

describe('httpsAttempt', () => {
  let pki: TestPki;
  let server: SoapTestServer | null = null;

  beforeAll(() => {
    pki = createTestPki();
  });

  afterEach(async () => {
    await server?.close();
    server = null;
  });

  function requestFor(url: string, overrides: Partial<TransportRequest> = {}): TransportRequest {
    return {
      url: new URL(url),
      headers: { 'Content-Type': 'text/xml; charset=utf-8', SOAPAction: '"Op"' },
      body: '<Envelope>ñ</Envelope>',
      connectTimeoutMs: 2000,
      readTimeoutMs: 2000,
      tls: {
        cert: Buffer.from(pki.client.certPem),
        key: Buffer.from(pki.client.keyPem),
        ca: [Buffer.from(pki.ca.certPem)],
      },
      ...overrides,
    };
  }

  async function failureOf(promise: Promise<unknown>): Promise<TransportAttemptError> {
    const error = await promise.then(
      () => null,
      (e: unknown) => e
    );
    if (!(error instanceof TransportAttemptError)) {
      throw new Error(`Expected a TransportAttemptError, got ${String(error)}`);
    }
    return error;
  }

  it('should post over mutual TLS and return the response', async () => {
    server = await startSoapServer(pki, (_req, res) => respondXml(res, '<ok>sí</ok>'));

    const exchange = await httpsAttempt(requestFor(server.url));

    expect(exchange.statusCode).toBe(200);
    expect(exchange.body).toBe('<ok>sí</ok>');
    expect(server.requests).toHaveLength(1);
    const received = server.requests[0];
    expect(received?.method).toBe('POST');
    expect(received?.path).toBe('/ws/SuministroFactEmitidas');
    expect(received?.body).toBe('<Envelope>ñ</Envelope>');
    expect(received?.headers['soapaction']).toBe('"Op"');
    expect(received?.headers['content-length']).toBe(String(Buffer.byteLength('<Envelope>ñ</Envelope>')));
    expect(received?.clientCommonName).toBe('ACME SL');
  });

  it('should return error statuses with their body', async () => {
    server = await startSoapServer(pki, (_req, res) => respondXml(res, '<fault/>', 500));

    const exchange = await httpsAttempt(requestFor(server.url));

    expect(exchange.statusCode).toBe(500);
    expect(exchange.statusMessage).toBe('Internal Server Error');
    expect(exchange.body).toBe('<fault/>');
  });

  it('should fail in the tls phase when the server certificate is not trusted', async () => {
    server = await startSoapServer(pki, (_req, res) => respondXml(res, '<ok/>'));
    const otherCa = issueCertificate({ commonName: 'Unrelated CA', isCa: true });

    const error = await failureOf(
      httpsAttempt(
        requestFor(server.url, {
          tls: {
            cert: Buffer.from(pki.client.certPem),
            key: Buffer.from(pki.client.keyPem),
            ca: [Buffer.from(otherCa.certPem)],
          },
        })
      )
    );

    expect(error.phase).toBe('tls');
    expect(server.requests).toHaveLength(0);
  });

  it('should fail in the connect phase when nothing listens', async () => {
    const port = await findClosedPort();

    const error = await failureOf(httpsAttempt(requestFor(`https://127.0.0.1:${port}/ws`)));

    expect(error.phase).toBe('connect');
    expect(error.code).toBe('ECONNREFUSED');
  });

  it('should time out in the exchange phase when the server does not answer', async () => {
    server = await startSoapServer(pki, () => undefined);

    const error = await failureOf(httpsAttempt(requestFor(server.url, { readTimeoutMs: 300 })));

    expect(error.phase).toBe('exchange');
    expect(error.code).toBe(READ_TIMEOUT_CODE);
    expect(error.message).toBe('No response within 300ms after the request was sent');
  });
});
