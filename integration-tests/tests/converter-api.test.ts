/**
 * Converter API Tests
 *
 * Starts the Express app on an ephemeral local port, without a queue.
 */

import type { Server } from 'http';
import { createApp } from '../../services/converter-api/src/app';

describe('Converter API (in-process)', () => {
  let server: Server;
  let baseUrl: string;

  beforeAll((done) => {
    server = createApp().listen(0, () => {
      const address = server.address();
      baseUrl = typeof address === 'object' && address !== null ? `http://127.0.0.1:${address.port}` : '';
      done();
    });
  });

  afterAll((done) => {
    server.close(() => done());
  });

  async function post(path: string, body: unknown, headers: Record<string, string> = {}): Promise<Response> {
    return fetch(`${baseUrl}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers },
      body: JSON.stringify(body),
    });
  }

  it('should report health', async () => {
    const response = await fetch(`${baseUrl}/health`);
    const body: unknown = await response.json();

    expect(response.status).toBe(200);
    expect(body).toMatchObject({ status: 'healthy', service: 'converter-api' });
  });

  it('should convert a document synchronously', async () => {
    const response = await post(
      '/convert',
      { document_id: 'api-1', lines: ['# Whitening Consent', 'Results vary.', 'Signature: ______ Date: ______'] },
      { 'X-Correlation-Id': 'cid-api-1' }
    );
    const body: unknown = await response.json();

    expect(response.status).toBe(200);
    expect(response.headers.get('x-correlation-id')).toBe('cid-api-1');
    expect(body).toMatchObject({
      document_id: 'api-1',
      fields: [{ key: 'text' }, { key: 'signature' }, { key: 'date_signed' }],
    });
  });

  it('should answer 400 for a body that breaks the contract', async () => {
    const response = await post('/convert', { lines: 'nope' }, { 'X-Correlation-Id': 'cid-api-2' });
    const body: unknown = await response.json();

    expect(response.status).toBe(400);
    expect(body).toMatchObject({ error: { code: 'invalid_request', correlation_id: 'cid-api-2' } });
  });

  it('should answer 400 for a document without text', async () => {
    const response = await post('/convert', { document_id: 'api-3', lines: ['   '] });
    const body: unknown = await response.json();

    expect(response.status).toBe(400);
    expect(body).toMatchObject({ error: { code: 'malformed_input' } });
  });

  it('should answer 422 when validation rejects the document', async () => {
    const response = await post('/convert', { document_id: 'api-4', lines: ['Do you smoke? ☐ ☐'] });
    const body: unknown = await response.json();

    expect(response.status).toBe(422);
    expect(body).toMatchObject({ error: { code: 'schema_violation', details: [{ code: 'empty_options' }] } });
  });

  it('should answer 503 for jobs without a queue', async () => {
    const response = await post('/jobs', { lines: ['Consent'] });
    expect(response.status).toBe(503);
  });

  it('should serve Prometheus metrics', async () => {
    const response = await fetch(`${baseUrl}/metrics`);
    const text = await response.text();

    expect(response.status).toBe(200);
    expect(text).toContain('formflow_documents_converted_total');
  });
});
